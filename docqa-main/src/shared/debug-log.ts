/**
 * Color-coded console logger.
 *
 * Every line carries a bright magenta [DOCQA] prefix so it is easy to grep.
 * Set DOCQA_QUIET=1 to silence info and warning lines; errors always print.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[DOCQA]${RESET}`;

function quiet(): boolean {
  return process.env["DOCQA_QUIET"] === "1";
}

export function devLog(...args: unknown[]): void {
  if (quiet()) return;
  console.log(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (quiet()) return;
  console.warn(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  console.error(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
