import { renderToStaticMarkup } from "react-dom/server";
import { AskPage } from "./components/ask-page.js";
import type { AskPageView } from "./types.js";

export const PAGE_TITLE = "Document Q&A Agent";

export function renderAskPage(view: Omit<AskPageView, "title">): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(<AskPage title={PAGE_TITLE} {...view} />)}`;
}
