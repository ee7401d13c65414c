/**
 * Error taxonomy for tool registration and invocation.
 *
 * Registration problems raise `ToolDefinitionError` and are meant to stop the
 * worker from serving. Everything deriving from `ToolRuntimeError` is raised
 * while a call is in flight and ends up in an invocation envelope instead.
 */

export class ToolError extends Error {
  public readonly code: string = "TOOL_ERROR";
  constructor(message: string) {
    super(message);
    this.name = "ToolError";
  }
}

export class ToolDefinitionError extends ToolError {
  public override readonly code: string = "TOOL_DEFINITION";
  constructor(message: string) {
    super(message);
    this.name = "ToolDefinitionError";
  }
}

export class UnsupportedParameterTypeError extends ToolDefinitionError {
  public override readonly code = "UNSUPPORTED_PARAMETER_TYPE" as const;
  constructor(
    public readonly parameter: string,
    public readonly typeName: string
  ) {
    super(`Unsupported parameter type for '${parameter}': ${typeName}`);
    this.name = "UnsupportedParameterTypeError";
  }
}

export interface ToolRuntimeErrorOptions {
  developerMessage?: string;
  canRetry?: boolean;
  cause?: unknown;
}

export class ToolRuntimeError extends Error {
  public readonly code: string = "TOOL_RUNTIME";
  public readonly developerMessage?: string;
  public readonly canRetry: boolean;

  constructor(message: string, options: ToolRuntimeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ToolRuntimeError";
    this.developerMessage = options.developerMessage;
    this.canRetry = options.canRetry ?? false;
  }
}

export class ToolExecutionError extends ToolRuntimeError {
  public override readonly code: string = "TOOL_EXECUTION";
  constructor(message: string, options: ToolRuntimeErrorOptions = {}) {
    super(message, options);
    this.name = "ToolExecutionError";
  }
}

export interface RetryableToolErrorOptions {
  developerMessage?: string;
  /** Extra text for the model before it tries again */
  additionalPromptContent?: string;
  retryAfterMs?: number;
  cause?: unknown;
}

/**
 * Raised by a tool to ask the orchestrator for another attempt, optionally
 * after `retryAfterMs` and with corrective context for the model.
 */
export class RetryableToolError extends ToolExecutionError {
  public override readonly code = "TOOL_RETRYABLE" as const;
  public readonly additionalPromptContent?: string;
  public readonly retryAfterMs?: number;

  constructor(message: string, options: RetryableToolErrorOptions = {}) {
    super(message, { developerMessage: options.developerMessage, canRetry: true, cause: options.cause });
    this.name = "RetryableToolError";
    this.additionalPromptContent = options.additionalPromptContent;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class ToolSerializationError extends ToolRuntimeError {
  public override readonly code: string = "TOOL_SERIALIZATION";
  constructor(message: string, options: ToolRuntimeErrorOptions = {}) {
    super(message, options);
    this.name = "ToolSerializationError";
  }
}

export class ToolInputError extends ToolSerializationError {
  public override readonly code = "TOOL_INPUT" as const;
  constructor(message: string, options: ToolRuntimeErrorOptions = {}) {
    super(message, options);
    this.name = "ToolInputError";
  }
}

export class ToolOutputError extends ToolSerializationError {
  public override readonly code = "TOOL_OUTPUT" as const;
  constructor(message: string, options: ToolRuntimeErrorOptions = {}) {
    super(message, options);
    this.name = "ToolOutputError";
  }
}

export function isToolRuntimeError(error: unknown): error is ToolRuntimeError {
  return error instanceof ToolRuntimeError;
}

export function isRetryableToolError(error: unknown): error is RetryableToolError {
  return error instanceof RetryableToolError;
}
