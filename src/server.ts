import express, { Application, Request, Response } from "express";
import helmet from "helmet";
import compression from "compression";
import cors from "cors";
import http from "http";
import { config } from "./config";
import { errorHandler, notFound } from "./app/Middlewares";
import { logger, withRequestId, httpLogger } from "./observability/logging";
import { attachSentryErrorHandler, initSentry } from "./observability/sentry";
import { apiRoutes } from "./routes";
import healthRouter from "./routes/health";
import type { Services } from "./services/container";

export interface ServerOptions {
  corsOrigins?: string[];
  rateLimit?: { windowMs: number; max: number };
}

export class Server {
  public app: Application;

  public port: number;

  private http?: http.Server;

  constructor(port: number, private readonly services: Services, private readonly options: ServerOptions = {}) {
    this.app = express();
    this.port = port;

    initSentry();
    this.registerMiddlewares();
    this.registerRoutes();
    this.registerErrorHandlers();
  }

  registerMiddlewares() {
    this.app.use(express.json({ limit: "1mb" }));
    this.app.use(helmet());
    this.app.use(compression());
    this.app.use(withRequestId, httpLogger);

    const allowedOrigins = this.options.corsOrigins ?? [];
    this.app.use(cors({
      origin: (origin, cb) => {
        if (!origin || allowedOrigins.includes(origin)) return cb(null, true);
        return cb(null, false);
      },
    }));
  }

  registerRoutes() {
    this.app.get("/api", (_req: Request, res: Response) => {
      res.status(200).json({ message: "Daily metabolic ledger API" });
    });
    this.app.use("/", healthRouter);
    this.app.use("/api/v1", apiRoutes(this.services, { rateLimit: this.options.rateLimit }));
  }

  registerErrorHandlers() {
    this.app.use(notFound);
    attachSentryErrorHandler(this.app);
    this.app.use(errorHandler);
  }

  start() {
    this.http = http.createServer(this.app);
    this.http.listen(this.port, () => {
      logger.info({ port: this.port, driver: config.db.driver }, "HTTP server started");
    });
    return this.http;
  }

  stop(): Promise<void> {
    const server = this.http;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
