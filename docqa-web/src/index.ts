export { WebServer } from "./server/index.js";
export type { RenderedPage, WebServerOptions } from "./server/index.js";
export { handleAskSubmission } from "./app/ask-handler.js";
export type { AskHandlerDeps } from "./app/ask-handler.js";
export { parseAskForm } from "./app/ask-form-parser.js";
export { PAGE_TITLE, renderAskPage } from "./app/render.js";
export type { AskPageView, AskService, AskSubmission } from "./app/types.js";
