import type pino from "pino";
import { HttpError } from "./errors";
import type { RequestData, WorkerComponent } from "./WorkerTypes";

export interface AuthGate {
  isAuthorized(request: RequestData): boolean;
}

export interface RouteResult {
  status: number;
  /** `undefined` answers with no content */
  body?: unknown;
}

/**
 * Host-neutral request handling shared by the router adapters: the auth gate
 * runs once, before the component, and failures map onto status codes.
 */
export async function dispatch(
  gate: AuthGate,
  component: WorkerComponent,
  requireAuth: boolean,
  request: RequestData,
  log: pino.Logger
): Promise<RouteResult> {
  if (requireAuth && !gate.isAuthorized(request)) {
    log.warn({ path: request.path, method: request.method }, "unauthorized request");
    return { status: 401, body: { error: "unauthorized" } };
  }
  try {
    const body = await component.handle(request);
    return body === undefined ? { status: 204 } : { status: 200, body };
  } catch (err) {
    if (err instanceof HttpError) {
      log.info({ path: request.path, status: err.status }, err.message);
      return { status: err.status, body: { error: err.message } };
    }
    log.error({ err, path: request.path }, "request failed");
    return { status: 500, body: { error: "Internal error" } };
  }
}
