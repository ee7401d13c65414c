import { z } from "zod";
import type { ToolAuthorization } from "./ToolAuth";
import type { ToolContext } from "./ToolContext";

export type WireType = "string" | "integer" | "float" | "boolean" | "json";

export type OutputMode = "value" | "error" | "null";

export interface ValueSchema {
  readonly valType: WireType;
  readonly enum?: readonly string[];
}

export interface InputParameter {
  /** Name on the wire; differs from the native key when renamed */
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
  readonly inferrable: boolean;
  readonly valueSchema: ValueSchema;
}

export interface ToolInputs {
  readonly parameters: readonly InputParameter[];
}

export interface ToolOutput {
  readonly description: string;
  readonly availableModes: readonly OutputMode[];
  readonly valueSchema: ValueSchema | null;
}

export interface ToolkitInfo {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
}

export interface ToolRequirements {
  readonly authorization?: ToolAuthorization;
}

export interface ToolDefinition {
  readonly name: string;
  /** `<Toolkit>.<Tool>` */
  readonly fullyQualifiedName: string;
  readonly description: string;
  readonly toolkit: ToolkitInfo;
  readonly version: string;
  readonly inputs: ToolInputs;
  readonly output: ToolOutput;
  readonly requirements: ToolRequirements;
}

// ---- declaration helpers ----

export interface InferrableMarker {
  readonly kind: "inferrable";
  readonly value: boolean;
}

export function Inferrable(value = true): InferrableMarker {
  return { kind: "inferrable", value };
}

/** The model must not guess this value; the caller supplies it verbatim. */
export const NotInferrable: InferrableMarker = Inferrable(false);

export type ParamAnnotation = string | InferrableMarker;

export interface FieldInfo {
  readonly description?: string;
  readonly default?: unknown;
  readonly defaultFactory?: () => unknown;
}

export interface ParamSpec<S extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly kind: "param";
  readonly schema: S;
  readonly annotations: readonly ParamAnnotation[];
  readonly field?: FieldInfo;
}

/**
 * Annotate a parameter type. String annotations give the description, or the
 * wire name followed by the description; `NotInferrable` marks values the
 * model must not invent.
 */
export function annotated<S extends z.ZodTypeAny>(schema: S, ...annotations: ParamAnnotation[]): ParamSpec<S> {
  return { kind: "param", schema, annotations };
}

/** Structured field descriptor; its description and default win over annotations. */
export function field<S extends z.ZodTypeAny>(schema: S, info: FieldInfo, ...annotations: ParamAnnotation[]): ParamSpec<S> {
  return { kind: "param", schema, annotations, field: info };
}

export type ParamInput = z.ZodTypeAny | ParamSpec;

export type ParamShape = Record<string, ParamInput>;

export type ParamValue<T extends ParamInput> =
  T extends ParamSpec<infer S> ? z.output<S> : T extends z.ZodTypeAny ? z.output<T> : never;

export type ToolArgs<P extends ParamShape> = { [K in keyof P]: ParamValue<P[K]> };

export interface ReturnSpec<S extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly kind: "returns";
  readonly schema: S;
  readonly description?: string;
}

export function returns<S extends z.ZodTypeAny>(schema: S, description?: string): ReturnSpec<S> {
  return { kind: "returns", schema, description };
}

export type ReturnInput = z.ZodTypeAny | ReturnSpec;

export type ReturnValue<R extends ReturnInput | undefined> =
  R extends ReturnSpec<infer S> ? z.input<S> : R extends z.ZodTypeAny ? z.input<R> : void;

export interface ToolOptions<P extends ParamShape, R extends ReturnInput | undefined> {
  /** Defaults to the PascalCase form of the function's name */
  readonly name?: string;
  readonly description: string;
  readonly version?: string;
  readonly params: P;
  readonly returns?: R;
  readonly requiresAuth?: ToolAuthorization;
}

export type ToolFunction<P extends ParamShape, R extends ReturnInput | undefined> = (
  args: ToolArgs<P>,
  context: ToolContext
) => ReturnValue<R> | Promise<ReturnValue<R>>;

/**
 * A callable together with the declarations the schema inference engine
 * reads. Built once by `tool()`; never mutated.
 */
export interface ToolDescriptor<P extends ParamShape = ParamShape, R extends ReturnInput | undefined = ReturnInput | undefined> {
  readonly kind: "tool";
  readonly options: ToolOptions<P, R>;
  /** The declared function itself; its name and source are inspected at registration */
  readonly fn: (...args: never[]) => unknown;
  execute(args: ToolArgs<P>, context: ToolContext): ReturnValue<R> | Promise<ReturnValue<R>>;
}

export type AnyToolDescriptor = ToolDescriptor<ParamShape, ReturnInput | undefined>;

export function tool<P extends ParamShape, R extends ReturnInput | undefined = undefined>(
  options: ToolOptions<P, R>,
  fn: ToolFunction<P, R>
): ToolDescriptor<P, R> {
  return Object.freeze({
    kind: "tool" as const,
    options,
    fn,
    execute: (args: ToolArgs<P>, context: ToolContext) => fn(args, context),
  });
}

export function isToolDescriptor(value: unknown): value is AnyToolDescriptor {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "tool" &&
    "fn" in value &&
    typeof value.fn === "function"
  );
}

export function isParamSpec(value: ParamInput): value is ParamSpec {
  return !(value instanceof z.ZodType) && value.kind === "param";
}

export function isReturnSpec(value: ReturnInput): value is ReturnSpec {
  return !(value instanceof z.ZodType) && value.kind === "returns";
}
