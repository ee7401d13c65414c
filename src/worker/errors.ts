export class HttpError extends Error {
  public readonly code: string = "HTTP_ERROR";
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class BadRequestError extends HttpError {
  public override readonly code = "BAD_REQUEST" as const;
  constructor(message: string) {
    super(400, message);
    this.name = "BadRequestError";
  }
}

export class ToolNotFoundError extends HttpError {
  public override readonly code = "TOOL_NOT_FOUND" as const;
  constructor(public readonly toolName: string, version?: string) {
    super(404, `Tool ${toolName}${version ? `@${version}` : ""} not found`);
    this.name = "ToolNotFoundError";
  }
}

export class PayloadTooLargeError extends HttpError {
  public override readonly code = "PAYLOAD_TOO_LARGE" as const;
  constructor(limit: number) {
    super(413, `request body exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}
