import express, { type ErrorRequestHandler, type RequestHandler } from "express";
import { componentLogger } from "../utils/logger";
import { BaseWorker, type WorkerOptions } from "./BaseWorker";
import { type AuthGate, type RouteResult, dispatch } from "./dispatch";
import { type HttpMethod, type Router, type WorkerComponent, MAX_BODY_BYTES, joinPath, normalizeHeaders } from "./WorkerTypes";

const log = componentLogger("router");

function send(res: express.Response, result: RouteResult): void {
  if (result.body === undefined) {
    res.status(result.status).end();
  } else {
    res.status(result.status).json(result.body);
  }
}

export class ExpressRouter implements Router {
  constructor(
    private readonly router: express.Router,
    private readonly gate: AuthGate
  ) {}

  addRoute(path: string, component: WorkerComponent, method: HttpMethod, requireAuth = true): void {
    const route = joinPath(path);
    const handler: RequestHandler = (req, res, next) => {
      const request = { path: req.path, method, bodyJson: req.body, headers: normalizeHeaders(req.headers) };
      dispatch(this.gate, component, requireAuth, request, log)
        .then(result => send(res, result))
        .catch(next);
    };
    if (method === "GET") this.router.get(route, handler);
    else this.router.post(route, handler);
    log.debug({ method, path: route }, "route added");
  }
}

const malformedBody: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "malformed request body" });
    return;
  }
  if (typeof err === "object" && err !== null && "type" in err && err.type === "entity.too.large") {
    res.status(413).json({ error: `request body exceeds ${MAX_BODY_BYTES} bytes` });
    return;
  }
  next(err);
};

/** Mounts the worker's routes under its base path on an existing express app. */
export class ExpressWorker extends BaseWorker {
  public readonly router: express.Router = express.Router();

  constructor(app: express.Express, options: WorkerOptions = {}) {
    super(options);
    this.router.use(express.json({ limit: MAX_BODY_BYTES }));
    this.registerRoutes(new ExpressRouter(this.router, this));
    this.router.use(malformedBody);
    app.use(this.basePath, this.router);
  }
}
