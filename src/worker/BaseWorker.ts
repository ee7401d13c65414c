import { WorkerConfigError } from "../config/WorkerConfig";
import { DEFAULT_TOOLKIT, ToolCatalog, type ToolListing } from "../tools/ToolCatalog";
import { ToolContext } from "../tools/ToolContext";
import { type InvocationResponse, ToolExecutor } from "../tools/ToolExecutor";
import type { Toolkit } from "../tools/Toolkit";
import type { AnyToolDescriptor, ToolDefinition } from "../tools/ToolTypes";
import { componentLogger } from "../utils/logger";
import { verifyBearer } from "./auth";
import { CallToolComponent, CatalogComponent, type ComponentFactory, HealthCheckComponent } from "./components";
import type { AuthGate } from "./dispatch";
import { ToolNotFoundError } from "./errors";
import { McpComponent } from "./mcp";
import type { HealthStatus, InvocationRequest, RequestData, Router } from "./WorkerTypes";
import { joinPath } from "./WorkerTypes";

export const SECRET_ENV = "TOOLHOST_WORKER_SECRET";

export interface WorkerOptions {
  /** Falls back to `TOOLHOST_WORKER_SECRET` */
  secret?: string;
  disableAuth?: boolean;
  catalogRequiresAuth?: boolean;
  basePath?: string;
  components?: readonly ComponentFactory[];
  env?: NodeJS.ProcessEnv;
}

/**
 * Owns a catalog and an executor and exposes them through components. Host
 * adapters only translate requests; everything else happens here.
 */
export class BaseWorker implements AuthGate {
  static readonly defaultComponents: readonly ComponentFactory[] = [
    CatalogComponent,
    CallToolComponent,
    HealthCheckComponent,
    McpComponent,
  ];

  public readonly catalog = new ToolCatalog();
  public readonly executor = new ToolExecutor();
  public readonly basePath: string;
  public readonly disableAuth: boolean;
  public readonly catalogRequiresAuth: boolean;
  protected readonly log = componentLogger("worker");
  private readonly secret: string;
  private readonly components: readonly ComponentFactory[];

  constructor(options: WorkerOptions = {}) {
    this.basePath = joinPath(options.basePath ?? "/worker");
    this.disableAuth = options.disableAuth ?? false;
    this.catalogRequiresAuth = options.catalogRequiresAuth ?? true;
    this.components = options.components ?? BaseWorker.defaultComponents;
    this.secret = this.resolveSecret(options.secret, options.env ?? process.env);
    if (this.disableAuth) {
      this.log.warn("worker is running without authentication; not for production use");
    }
  }

  private resolveSecret(secret: string | undefined, env: NodeJS.ProcessEnv): string {
    if (this.disableAuth) return "";
    const resolved = secret ?? env[SECRET_ENV];
    if (!resolved) {
      throw new WorkerConfigError(`No secret provided for worker. Set the ${SECRET_ENV} environment variable.`);
    }
    return resolved;
  }

  isAuthorized(request: RequestData): boolean {
    return this.disableAuth || verifyBearer(request.headers.authorization, this.secret);
  }

  registerTool(tool: AnyToolDescriptor, toolkitName: string = DEFAULT_TOOLKIT): void {
    this.catalog.addTool(tool, toolkitName);
  }

  registerToolkit(toolkit: Toolkit): void {
    this.catalog.addToolkit(toolkit);
  }

  get invokePath(): string {
    return joinPath(this.basePath, "tools/invoke");
  }

  getCatalog(): ToolListing[] {
    return this.catalog.list(this.invokePath);
  }

  getDefinitions(): ToolDefinition[] {
    return this.catalog.getDefinitions();
  }

  async callTool(request: InvocationRequest): Promise<InvocationResponse> {
    const { name, toolkit, version } = request.tool;
    const qualified = toolkit ? `${toolkit}.${name}` : name;
    const tool = this.catalog.get(qualified, version);
    if (!tool) throw new ToolNotFoundError(qualified, version);

    const context = new ToolContext({
      invocationId: request.invocationId,
      authorization: request.context.authorization,
      secrets: request.context.secrets,
    });
    return this.executor.run(tool, request.inputs, context);
  }

  healthCheck(): HealthStatus {
    return { status: "ok", toolCount: this.catalog.size };
  }

  registerRoutes(router: Router): void {
    for (const Component of this.components) new Component(this).register(router);
  }
}
