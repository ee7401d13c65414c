import crypto from "crypto";
import { z } from "zod";
import type { InvocationResponse } from "../tools/ToolExecutor";
import { BadRequestError } from "./errors";
import type { HealthStatus, InvocationRequest } from "./WorkerTypes";

// snake_case on the wire, camelCase inside

export const WireInvocationRequest = z.object({
  tool: z.object({
    name: z.string().min(1),
    toolkit: z.string().nullish(),
    version: z.string().nullish(),
  }),
  invocation_id: z.string().nullish(),
  inputs: z.record(z.unknown()).nullish(),
  context: z
    .object({
      authorization: z.object({ token: z.string().nullish() }).nullish(),
      secrets: z.record(z.string()).nullish(),
    })
    .nullish(),
});

export function parseInvocationRequest(body: unknown): InvocationRequest {
  const parsed = WireInvocationRequest.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".") || "(body)"}: ${i.message}`).join("; ");
    throw new BadRequestError(`Malformed invocation request: ${detail}`);
  }
  const { tool, invocation_id, inputs, context } = parsed.data;
  return {
    tool: { name: tool.name, toolkit: tool.toolkit ?? undefined, version: tool.version ?? undefined },
    invocationId: invocation_id || crypto.randomUUID(),
    inputs: inputs ?? {},
    context: {
      authorization: context?.authorization ? { token: context.authorization.token ?? undefined } : undefined,
      secrets: context?.secrets ?? undefined,
    },
  };
}

export function toWireResponse(response: InvocationResponse) {
  const { output } = response;
  return {
    invocation_id: response.invocationId,
    duration: response.durationMs,
    finished_at: response.finishedAt,
    success: response.success,
    output:
      "value" in output
        ? { value: output.value }
        : {
            error: {
              message: output.error.message,
              developer_message: output.error.developerMessage ?? null,
              can_retry: output.error.canRetry,
              additional_prompt_content: output.error.additionalPromptContent ?? null,
              retry_after_ms: output.error.retryAfterMs ?? null,
            },
          },
  };
}

export type WireInvocationResponse = ReturnType<typeof toWireResponse>;

export function toWireHealth(health: HealthStatus) {
  return { status: health.status, tool_count: health.toolCount };
}
