export type AuthProviderType = "oauth2";

/**
 * Authorization a tool needs before it can be called. The catalog only
 * carries it; the orchestrator obtains the token and passes it back in the
 * invocation context.
 */
export interface ToolAuthorization {
  readonly providerType: AuthProviderType;
  /** Alias of a well-known provider configuration, e.g. "google" */
  readonly providerId?: string;
  /** Provider-specific identifier, for private provider configurations */
  readonly id?: string;
  readonly scopes?: readonly string[];
}

export interface OAuth2Options {
  id?: string;
  scopes?: readonly string[];
}

export function OAuth2(options: OAuth2Options = {}, providerId?: string): ToolAuthorization {
  const authorization: ToolAuthorization = {
    providerType: "oauth2",
    providerId,
    id: options.id,
    scopes: options.scopes ? Object.freeze([...options.scopes]) : undefined,
  };
  return Object.freeze(authorization);
}

function provider(providerId: string) {
  return (options: OAuth2Options = {}): ToolAuthorization => OAuth2(options, providerId);
}

export const Atlassian = provider("atlassian");
export const Discord = provider("discord");
export const Dropbox = provider("dropbox");
export const GitHub = provider("github");
export const Google = provider("google");
export const LinkedIn = provider("linkedin");
export const Microsoft = provider("microsoft");
export const Notion = provider("notion");
export const Reddit = provider("reddit");
export const Slack = provider("slack");
export const Spotify = provider("spotify");
export const Twitch = provider("twitch");
export const X = provider("x");
export const Zoom = provider("zoom");
