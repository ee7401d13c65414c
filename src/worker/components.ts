import type { BaseWorker } from "./BaseWorker";
import { parseInvocationRequest, toWireHealth, toWireResponse } from "./wire";
import type { RequestData, Router, WorkerComponent } from "./WorkerTypes";

export type ComponentFactory = new (worker: BaseWorker) => WorkerComponent;

export class CatalogComponent implements WorkerComponent {
  constructor(private readonly worker: BaseWorker) {}

  register(router: Router): void {
    router.addRoute("tools", this, "GET", this.worker.catalogRequiresAuth);
    router.addRoute("catalog", this, "GET", this.worker.catalogRequiresAuth);
  }

  async handle(): Promise<unknown> {
    return this.worker.getCatalog();
  }
}

export class CallToolComponent implements WorkerComponent {
  constructor(private readonly worker: BaseWorker) {}

  register(router: Router): void {
    router.addRoute("tools/invoke", this, "POST");
    router.addRoute("invoke", this, "POST");
  }

  async handle(request: RequestData): Promise<unknown> {
    const invocation = parseInvocationRequest(request.bodyJson);
    return toWireResponse(await this.worker.callTool(invocation));
  }
}

/** Liveness probe; never behind the auth gate. */
export class HealthCheckComponent implements WorkerComponent {
  constructor(private readonly worker: BaseWorker) {}

  register(router: Router): void {
    router.addRoute("health", this, "GET", false);
  }

  async handle(): Promise<unknown> {
    return toWireHealth(this.worker.healthCheck());
  }
}
