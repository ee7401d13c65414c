import http from "http";
import { componentLogger } from "../utils/logger";
import type { BaseWorker } from "./BaseWorker";
import { type AuthGate, type RouteResult, dispatch } from "./dispatch";
import { HttpError, PayloadTooLargeError } from "./errors";
import {
  type HttpMethod,
  type RequestData,
  type Router,
  type WorkerComponent,
  MAX_BODY_BYTES,
  joinPath,
  normalizeHeaders,
} from "./WorkerTypes";

const log = componentLogger("router");

interface Route {
  component: WorkerComponent;
  requireAuth: boolean;
}

function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const refuse = () => {
      // drain the rest so the 413 still reaches the client
      req.removeAllListeners("data");
      req.resume();
      reject(new PayloadTooLargeError(limit));
    };
    if (Number(req.headers["content-length"]) > limit) {
      refuse();
      return;
    }
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (c: Buffer) => {
      size += c.length;
      if (size > limit) refuse();
      else chunks.push(c);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

function send(res: http.ServerResponse, result: RouteResult): void {
  if (result.body === undefined) {
    res.writeHead(result.status).end();
    return;
  }
  const data = JSON.stringify(result.body);
  res.writeHead(result.status, { "Content-Type": "application/json", "Content-Length": Buffer.byteLength(data) });
  res.end(data);
}

/** Router over a bare `http.Server`, for hosts that do not run express. */
export class HttpRouter implements Router {
  private routes: Map<string, Route> = new Map();

  constructor(
    private readonly gate: AuthGate,
    private readonly basePath = "/"
  ) {}

  addRoute(path: string, component: WorkerComponent, method: HttpMethod, requireAuth = true): void {
    const route = joinPath(this.basePath, path);
    this.routes.set(`${method} ${route}`, { component, requireAuth });
    log.debug({ method, path: route }, "route added");
  }

  readonly listener = (req: http.IncomingMessage, res: http.ServerResponse): void => {
    this.handle(req, res).catch(err => {
      log.error({ err }, "request failed");
      if (!res.headersSent) send(res, { status: 500, body: { error: "Internal error" } });
    });
  };

  async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const path = joinPath(new URL(req.url ?? "/", "http://localhost").pathname);
    const method = req.method === "GET" || req.method === "POST" ? req.method : undefined;
    const route = method && this.routes.get(`${method} ${path}`);
    if (!method || !route) {
      send(res, { status: 404, body: { error: "not found" } });
      return;
    }

    const request: RequestData = { path, method, headers: normalizeHeaders(req.headers) };
    if (method === "POST") {
      let raw: string;
      try {
        raw = await readBody(req, MAX_BODY_BYTES);
      } catch (err) {
        if (!(err instanceof HttpError)) throw err;
        send(res, { status: err.status, body: { error: err.message } });
        return;
      }
      try {
        request.bodyJson = raw ? JSON.parse(raw) : undefined;
      } catch {
        send(res, { status: 400, body: { error: "malformed request body" } });
        return;
      }
    }
    send(res, await dispatch(this.gate, route.component, route.requireAuth, request, log));
  }
}

export function createHttpServer(worker: BaseWorker): http.Server {
  const router = new HttpRouter(worker, worker.basePath);
  worker.registerRoutes(router);
  return http.createServer(router.listener);
}
