import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import type { Server } from "node:http";
import { devError, devLog } from "docqa-main";
import { handleAskSubmission } from "../app/ask-handler.js";
import { parseAskForm } from "../app/ask-form-parser.js";
import { renderAskPage } from "../app/render.js";
import type { AskService, AskSubmission } from "../app/types.js";

const DEFAULT_PORT = 7860;

export interface WebServerOptions {
  agent: AskService;
  models: readonly string[];
  defaultModel: string;
  supportedFormats: readonly string[];
  maxUploadBytes: number;
  port?: number;
}

export interface RenderedPage {
  status: number;
  html: string;
}

export class WebServer {
  private readonly options: WebServerOptions;
  private readonly port: number;
  private server: Server | null = null;
  readonly app: Express;

  constructor(options: WebServerOptions) {
    this.options = options;
    this.port = options.port ?? DEFAULT_PORT;
    this.app = this.createApp();
  }

  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        devLog(`Web form listening on http://localhost:${this.port}`);
        resolve();
      });
      server.once("error", reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    devLog("Web form stopped");
  }

  /** The empty form, with the default model selected. */
  renderForm(): RenderedPage {
    return this.page(200, "", this.options.defaultModel, "");
  }

  /** Parses one submission, asks the agent and renders the result. */
  async respondToAsk(body: unknown, contentType: string | undefined): Promise<RenderedPage> {
    if (!(body instanceof Uint8Array) || !contentType) {
      return this.page(400, "", this.options.defaultModel, "Error: Please upload a document first.");
    }

    let submission: AskSubmission;
    try {
      submission = await parseAskForm(body, contentType);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return this.page(400, "", this.options.defaultModel, `Error: ${message}`);
    }

    const answer = await handleAskSubmission(submission, {
      agent: this.options.agent,
      models: this.options.models,
    });
    const model = submission.model || this.options.defaultModel;
    return this.page(200, submission.question, model, answer);
  }

  /** Request-level failures, such as an oversized upload, shown in the answer area. */
  renderFailure(err: unknown): RenderedPage {
    if (isPayloadTooLarge(err)) {
      return this.page(
        413,
        "",
        this.options.defaultModel,
        `Error: Upload exceeds the limit of ${this.options.maxUploadBytes} bytes.`,
      );
    }
    const message = err instanceof Error ? err.message : String(err);
    return this.page(500, "", this.options.defaultModel, `Error: ${message}`);
  }

  private createApp(): Express {
    const app = express();
    const parseUpload = express.raw({
      type: "multipart/form-data",
      limit: this.options.maxUploadBytes,
    });

    app.get("/", (_req: Request, res: Response) => {
      send(res, this.renderForm());
    });

    app.post("/", parseUpload, (req: Request, res: Response, next: NextFunction) => {
      this.respondToAsk(req.body, req.get("content-type"))
        .then((page) => send(res, page))
        .catch(next);
    });

    const onError: ErrorRequestHandler = (err, _req, res, _next) => {
      devError("Request failed:", err);
      send(res, this.renderFailure(err));
    };
    app.use(onError);

    return app;
  }

  private page(status: number, question: string, model: string, answer: string): RenderedPage {
    return {
      status,
      html: renderAskPage({
        models: this.options.models,
        supportedFormats: this.options.supportedFormats,
        question,
        model,
        answer,
      }),
    };
  }
}

function send(res: Response, page: RenderedPage): void {
  res.status(page.status).type("html").send(page.html);
}

function isPayloadTooLarge(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.too.large";
}
