export function renderLabelledBlock(label: string, content: string): string {
  return `${label}:\n${content}`;
}

export function joinPromptBlocks(blocks: string[]): string {
  return blocks.join("\n\n");
}
