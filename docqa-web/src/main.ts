import "dotenv/config";
import { createDocumentQaApp, devError, devLog } from "docqa-main";
import { WebServer } from "./server/index.js";

async function main(): Promise<void> {
  const app = await createDocumentQaApp();
  const webServer = new WebServer({
    agent: app.agent,
    models: app.models,
    defaultModel: app.defaultModel,
    supportedFormats: app.supportedFormats,
    maxUploadBytes: app.config.maxUploadBytes,
    port: app.config.port,
  });

  await webServer.start();
  devLog(`Document Q&A ready: provider=${app.config.provider} formats=[${app.supportedFormats.join(", ")}]`);

  const shutdown = async (): Promise<void> => {
    await webServer.stop();
    await app.stop();
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => devError("Shutdown failed:", err));
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err: unknown) => {
  devError("Failed to start:", err);
  process.exitCode = 1;
});
