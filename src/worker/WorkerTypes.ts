import type { IncomingHttpHeaders } from "http";

export type HttpMethod = "GET" | "POST";

/** What a host framework hands the worker; nothing else of the host request leaks through. */
export interface RequestData {
  path: string;
  method: HttpMethod;
  bodyJson?: unknown;
  /** Lower-cased names */
  headers: Record<string, string>;
}

export interface WorkerComponent {
  register(router: Router): void;
  /** Resolves to the JSON body; `undefined` means no content */
  handle(request: RequestData): Promise<unknown>;
}

export interface Router {
  addRoute(path: string, component: WorkerComponent, method: HttpMethod, requireAuth?: boolean): void;
}

export interface InvocationRequest {
  tool: { name: string; toolkit?: string; version?: string };
  invocationId: string;
  inputs: Record<string, unknown>;
  context: {
    authorization?: { token?: string };
    secrets?: Record<string, string>;
  };
}

export interface HealthStatus {
  status: "ok";
  toolCount: number;
}

export function normalizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    out[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return out;
}

/** Request bodies above this size are refused with 413 by both routers. */
export const MAX_BODY_BYTES = 1024 * 1024;

export function joinPath(...parts: string[]): string {
  const joined = parts
    .map(p => p.replace(/^\/+|\/+$/g, ""))
    .filter(Boolean)
    .join("/");
  return `/${joined}`;
}
