import { z } from "zod";
import { openAIToolName, toOpenAITool } from "../tools/OpenAIFormat";
import type { InvocationResponse } from "../tools/ToolExecutor";
import type { ToolDefinition } from "../tools/ToolTypes";
import { VERSION } from "../version";
import type { BaseWorker } from "./BaseWorker";
import { HttpError } from "./errors";
import type { RequestData, Router, WorkerComponent } from "./WorkerTypes";

export const MCP_PROTOCOL_VERSION = "2024-11-05";

export const RpcErrorCode = {
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

type RpcId = string | number;

const JsonRpcRequest = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number()]).nullish(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

const ToolCallParams = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});

class RpcError extends Error {
  constructor(
    public readonly rpcCode: number,
    message: string
  ) {
    super(message);
    this.name = "RpcError";
  }
}

function rpcError(id: RpcId | null, code: number, message: string) {
  return { jsonrpc: "2.0" as const, id, error: { code, message } };
}

export interface McpTool {
  name: string;
  description: string;
  inputSchema?: Record<string, unknown>;
}

export function toMcpTool(definition: ToolDefinition): McpTool {
  return {
    name: openAIToolName(definition),
    description: definition.description,
    inputSchema: toOpenAITool(definition).function.parameters,
  };
}

function asText(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * JSON-RPC 2.0 surface over the same catalog and executor, speaking the
 * model context protocol's tool methods. Notifications get no content back.
 */
export class McpComponent implements WorkerComponent {
  constructor(private readonly worker: BaseWorker) {}

  register(router: Router): void {
    router.addRoute("mcp", this, "POST");
  }

  async handle(request: RequestData): Promise<unknown> {
    const parsed = JsonRpcRequest.safeParse(request.bodyJson);
    if (!parsed.success) return rpcError(null, RpcErrorCode.InvalidRequest, "Invalid Request");

    const { id, method, params } = parsed.data;
    if (id === undefined || id === null) return undefined;

    try {
      return { jsonrpc: "2.0" as const, id, result: await this.call(id, method, params ?? {}) };
    } catch (err) {
      if (err instanceof RpcError) return rpcError(id, err.rpcCode, err.message);
      throw err;
    }
  }

  private async call(id: RpcId, method: string, params: Record<string, unknown>): Promise<unknown> {
    switch (method) {
      case "initialize":
        return {
          protocolVersion: MCP_PROTOCOL_VERSION,
          capabilities: { tools: { listChanged: false } },
          serverInfo: { name: "toolhost", version: VERSION },
        };
      case "ping":
        return {};
      case "tools/list":
        return { tools: this.worker.catalog.getLatestDefinitions().map(toMcpTool) };
      case "tools/call":
        return this.callTool(id, params);
      default:
        throw new RpcError(RpcErrorCode.MethodNotFound, `Method not found: ${method}`);
    }
  }

  private async callTool(id: RpcId, params: Record<string, unknown>): Promise<unknown> {
    const parsed = ToolCallParams.safeParse(params);
    if (!parsed.success) throw new RpcError(RpcErrorCode.InvalidParams, "tools/call needs a tool name");

    // same resolution as /invoke: the latest version of the qualified name
    const definition = this.worker.catalog.getLatestDefinitions().find(d => openAIToolName(d) === parsed.data.name);
    if (!definition) throw new RpcError(RpcErrorCode.InvalidParams, `Unknown tool: ${parsed.data.name}`);

    let response: InvocationResponse;
    try {
      response = await this.worker.callTool({
        tool: { name: definition.fullyQualifiedName },
        invocationId: String(id),
        inputs: parsed.data.arguments ?? {},
        context: {},
      });
    } catch (err) {
      if (err instanceof HttpError) throw new RpcError(RpcErrorCode.InvalidParams, err.message);
      throw err;
    }

    const { output } = response;
    if ("value" in output) {
      return {
        content: [{ type: "text", text: asText(output.value) }],
        structuredContent: { value: output.value },
        isError: false,
      };
    }
    return { content: [{ type: "text", text: output.error.message }], isError: true };
  }
}
