import { performance } from "perf_hooks";
import type { z } from "zod";
import type { ParameterBinding } from "./SchemaInference";
import type { MaterializedTool } from "./ToolCatalog";
import type { ToolContext } from "./ToolContext";
import {
  ToolExecutionError,
  ToolInputError,
  ToolOutputError,
  type ToolRuntimeError,
  isRetryableToolError,
  isToolRuntimeError,
} from "./ToolErrors";
import type { WireType } from "./ToolTypes";
import { componentLogger } from "../utils/logger";

const log = componentLogger("executor");

export interface ToolCallError {
  message: string;
  developerMessage?: string;
  canRetry: boolean;
  additionalPromptContent?: string;
  retryAfterMs?: number;
}

export type ToolCallOutput = { value: unknown } | { error: ToolCallError };

export interface InvocationResponse {
  invocationId: string;
  durationMs: number;
  /** ISO-8601 */
  finishedAt: string;
  success: boolean;
  output: ToolCallOutput;
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Lift wire representations (numeric text, "true"/"false", JSON text) to the declared wire type. */
export function coerceWireValue(value: unknown, type: WireType): unknown {
  if (typeof value !== "string") return value;
  switch (type) {
    case "integer":
    case "float":
      return NUMERIC.test(value.trim()) ? Number(value) : value;
    case "boolean": {
      const lowered = value.trim().toLowerCase();
      if (lowered === "true") return true;
      if (lowered === "false") return false;
      return value;
    }
    case "json":
      try {
        return JSON.parse(value);
      } catch {
        // left as text; the schema reports the mismatch
        return value;
      }
    default:
      return value;
  }
}

export function matchesWireType(value: unknown, type: WireType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "float":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "json":
      return typeof value === "object" && value !== null;
  }
}

/**
 * Validates wire inputs, runs the callable and wraps whatever happens in an
 * invocation envelope. Holds no state; concurrent `run` calls are independent.
 */
export class ToolExecutor {
  async run(tool: MaterializedTool, rawInputs: Record<string, unknown>, context: ToolContext): Promise<InvocationResponse> {
    const name = tool.definition.fullyQualifiedName;
    let durationMs = 0;
    try {
      const args = this.bindInputs(tool, rawInputs);
      const started = performance.now();
      let value: unknown;
      try {
        value = await tool.tool.execute(args, context);
      } finally {
        durationMs = performance.now() - started;
      }
      return this.respond(context, durationMs, { value: this.serializeOutput(tool, value) });
    } catch (err) {
      const error = this.classify(name, err);
      if (isToolRuntimeError(err)) {
        log.warn({ tool: name, invocationId: context.invocationId, code: error.code }, error.message);
      } else {
        log.error({ tool: name, invocationId: context.invocationId, err }, "unexpected tool failure");
      }
      return this.respond(context, durationMs, { error: this.toCallError(error) });
    }
  }

  bindInputs(tool: MaterializedTool, rawInputs: Record<string, unknown>): Record<string, unknown> {
    const known = new Set(tool.bindings.map(b => b.parameter.name));
    const ignored = Object.keys(rawInputs).filter(k => !known.has(k));
    if (ignored.length) log.debug({ tool: tool.definition.fullyQualifiedName, ignored }, "ignoring unknown inputs");

    const args: Record<string, unknown> = {};
    for (const binding of tool.bindings) {
      const { name } = binding.parameter;
      const value = this.bindInput(binding, Object.hasOwn(rawInputs, name) ? rawInputs[name] : undefined);
      if (value !== undefined) args[binding.key] = value;
    }
    return args;
  }

  private bindInput(binding: ParameterBinding, raw: unknown): unknown {
    const { name, required, valueSchema } = binding.parameter;
    let value = raw;
    if (value === undefined || value === null) {
      const fallback = binding.fieldDefault?.();
      if (fallback !== undefined) {
        value = fallback;
      } else if (required) {
        throw new ToolInputError(`Missing required input: ${name}`);
      } else {
        return this.bindAbsent(binding);
      }
    }

    const parsed = binding.schema.safeParse(coerceWireValue(value, valueSchema.valType));
    if (!parsed.success) {
      throw new ToolInputError(`Invalid value for input '${name}'`, {
        developerMessage: formatIssues(parsed.error),
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  // optional schemas accept undefined, nullable ones only null
  private bindAbsent(binding: ParameterBinding): unknown {
    for (const candidate of [undefined, null]) {
      const parsed = binding.schema.safeParse(candidate);
      if (parsed.success) return parsed.data;
    }
    throw new ToolInputError(`Invalid value for input '${binding.parameter.name}'`);
  }

  serializeOutput(tool: MaterializedTool, value: unknown): unknown {
    const { output, fullyQualifiedName } = tool.definition;
    if (value === undefined || value === null) {
      if (output.availableModes.includes("null")) return null;
      throw new ToolOutputError(`Tool ${fullyQualifiedName} returned no value`);
    }
    if (!tool.outputSchema || !output.valueSchema) {
      throw new ToolOutputError(`Tool ${fullyQualifiedName} declares no output but returned a value`);
    }

    const parsed = tool.outputSchema.safeParse(value);
    if (!parsed.success) {
      throw new ToolOutputError(`Tool ${fullyQualifiedName} returned a value that does not match its output`, {
        developerMessage: formatIssues(parsed.error),
        cause: parsed.error,
      });
    }
    if (!matchesWireType(parsed.data, output.valueSchema.valType)) {
      throw new ToolOutputError(
        `Tool ${fullyQualifiedName} returned ${typeof parsed.data}, expected ${output.valueSchema.valType}`
      );
    }
    return parsed.data;
  }

  private classify(name: string, err: unknown): ToolRuntimeError {
    if (isToolRuntimeError(err)) return err;
    // aborts and cancellations land here too
    return new ToolExecutionError(`Error in execution of '${name}'`, {
      developerMessage: describeError(err),
      cause: err,
    });
  }

  private toCallError(error: ToolRuntimeError): ToolCallError {
    const callError: ToolCallError = {
      message: error.message,
      developerMessage: error.developerMessage,
      canRetry: error.canRetry,
    };
    if (isRetryableToolError(error)) {
      callError.additionalPromptContent = error.additionalPromptContent;
      callError.retryAfterMs = error.retryAfterMs;
    }
    return callError;
  }

  private respond(context: ToolContext, durationMs: number, output: ToolCallOutput): InvocationResponse {
    return {
      invocationId: context.invocationId,
      durationMs,
      finishedAt: new Date().toISOString(),
      success: "value" in output,
      output,
    };
  }
}
