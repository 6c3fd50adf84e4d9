export { WebServer } from "./web-server.js";
export type { RenderedPage, WebServerOptions } from "./web-server.js";
