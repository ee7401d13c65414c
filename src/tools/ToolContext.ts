export interface ToolAuthorizationContext {
  token?: string;
}

export interface ToolContextInit {
  invocationId: string;
  authorization?: ToolAuthorizationContext | null;
  secrets?: Record<string, string> | null;
}

/**
 * Execution context injected into every tool call alongside its arguments.
 */
export class ToolContext {
  public readonly invocationId: string;
  public readonly authorization?: ToolAuthorizationContext;
  private readonly secrets: Readonly<Record<string, string>>;

  constructor(init: ToolContextInit) {
    this.invocationId = init.invocationId;
    this.authorization = init.authorization ?? undefined;
    this.secrets = Object.freeze({ ...(init.secrets ?? {}) });
  }

  getAuthTokenOrEmpty(): string {
    return this.authorization?.token ?? "";
  }

  getSecret(key: string): string {
    const value = Object.hasOwn(this.secrets, key) ? this.secrets[key] : undefined;
    if (value === undefined) throw new Error(`Secret ${key} not found in context.`);
    return value;
  }

  hasSecret(key: string): boolean {
    return Object.hasOwn(this.secrets, key);
  }
}
