export * from "./tools/ToolTypes";
export * from "./tools/ToolErrors";
export * from "./tools/ToolAuth";
export { ToolContext, type ToolContextInit } from "./tools/ToolContext";
export {
  createToolDefinition,
  createInputDefinition,
  createOutputDefinition,
  getWireType,
  getValueSchema,
  type InferredTool,
  type ParameterBinding,
} from "./tools/SchemaInference";
export { doesFunctionReturnValue } from "./tools/ReturnAnalysis";
export { Toolkit, type ToolkitOptions } from "./tools/Toolkit";
export { loadToolDirectory, type ToolDirectoryOptions } from "./tools/ToolLoader";
export { ToolCatalog, type MaterializedTool, type ToolMeta, type ToolListing, type AddToolOptions } from "./tools/ToolCatalog";
export { ToolExecutor, type InvocationResponse, type ToolCallError, type ToolCallOutput } from "./tools/ToolExecutor";
export { toOpenAITool, openAIToolName } from "./tools/OpenAIFormat";
export { BaseWorker, type WorkerOptions } from "./worker/BaseWorker";
export { ExpressRouter, ExpressWorker } from "./worker/ExpressRouter";
export { HttpRouter, createHttpServer } from "./worker/HttpRouter";
export { CatalogComponent, CallToolComponent, HealthCheckComponent } from "./worker/components";
export { McpComponent, toMcpTool, type McpTool } from "./worker/mcp";
export { HttpError, BadRequestError, PayloadTooLargeError, ToolNotFoundError } from "./worker/errors";
export type { RequestData, Router, WorkerComponent, InvocationRequest, HealthStatus } from "./worker/WorkerTypes";
export { loadWorkerConfig, WorkerConfigError, type WorkerConfig } from "./config/WorkerConfig";
export { createApp } from "./app";
