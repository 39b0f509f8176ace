import express, { type ErrorRequestHandler, type Express, type Router } from "express";
import type { Server } from "node:http";
import { HttpError, errorMessage } from "./errors.js";
import { type HttpRoute, errorResponse, parseUrl } from "./http.js";
import { type Logger, createLogger } from "./logger.js";

export const SECURITY_HEADERS: Record<string, string> = {
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "X-XSS-Protection": "1; mode=block",
  "Strict-Transport-Security": "max-age=31536000; includeSubDomains",
  "Referrer-Policy": "strict-origin-when-cross-origin",
};

/** What route modules see of the host. */
export type RouteRegistry = {
  registerHttpRoute(route: HttpRoute): void;
};

// Express and its middleware tag client errors (bad param encoding) with a 4xx status.
function clientErrorStatus(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

/**
 * Mounts `{ path, handler }` route tables on an Express app. Path parameters
 * come from Express routing; handlers keep the plain `(req, res, ctx)` shape.
 */
export class HttpHost implements RouteRegistry {
  private readonly app: Express = express();
  private readonly router: Router = express.Router();
  private readonly routePaths: string[] = [];
  private readonly log: Logger;
  private server: Server | null = null;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger("http");
    this.app.disable("x-powered-by");
    this.app.use((_req, res, next) => {
      res.set(SECURITY_HEADERS);
      next();
    });
    this.app.use(this.router);
    this.app.use((_req, res) => errorResponse(res, 404, "Not found"));
    this.app.use(this.handleError);
  }

  registerHttpRoute(route: HttpRoute): void {
    if (this.routePaths.includes(route.path)) {
      throw new Error(`Route already registered: ${route.path}`);
    }
    this.routePaths.push(route.path);
    this.router.all(route.path, (req, res, next) => {
      const started = Date.now();
      res.on("finish", () => {
        this.log.debug(`${req.method} ${req.path}`, { status: res.statusCode, ms: Date.now() - started });
      });
      route.handler(req, res, { url: parseUrl(req), params: { ...req.params } }).catch(next);
    });
  }

  get paths(): string[] {
    return [...this.routePaths];
  }

  private readonly handleError: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof HttpError) {
      errorResponse(res, err.status, err.message);
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== null) {
      errorResponse(res, status, errorMessage(err));
      return;
    }
    this.log.error("Unhandled route error", {
      method: req.method,
      path: req.path,
      error: errorMessage(err),
    });
    errorResponse(res, 500, String(err));
  };

  listen(port: number, host: string): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        server.off("error", reject);
        this.log.info("Listening", { host, port });
        resolve(server);
      });
      server.once("error", reject);
      this.server = server;
    });
  }

  close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
