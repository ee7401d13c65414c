import { z } from "zod";
import { doesFunctionReturnValue } from "./ReturnAnalysis";
import { ToolDefinitionError, UnsupportedParameterTypeError } from "./ToolErrors";
import {
  type AnyToolDescriptor,
  type FieldInfo,
  type InferrableMarker,
  type InputParameter,
  type OutputMode,
  type ParamInput,
  type ParamSpec,
  type ToolDefinition,
  type ToolInputs,
  type ToolkitInfo,
  type ToolOutput,
  type ValueSchema,
  type WireType,
  isParamSpec,
  isReturnSpec,
} from "./ToolTypes";
import { isBlank, toPascalCase } from "../utils/text";

const NO_DESCRIPTION = "No description provided.";
const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * How a wire input maps back onto the native argument object. Kept next to
 * the definition so the executor never has to re-derive it.
 */
export interface ParameterBinding {
  /** Key in the native argument object */
  readonly key: string;
  readonly parameter: InputParameter;
  /** Declared schema, optional/default wrappers included */
  readonly schema: z.ZodTypeAny;
  /** Default from a field descriptor, applied before schema parsing */
  readonly fieldDefault?: () => unknown;
}

export interface InferredTool {
  readonly definition: ToolDefinition;
  readonly bindings: readonly ParameterBinding[];
  /** Declared return schema with optional wrappers removed; absent in null mode */
  readonly outputSchema?: z.ZodTypeAny;
}

interface Unwrapped {
  readonly inner: z.ZodTypeAny;
  readonly optional: boolean;
  readonly hasDefault: boolean;
  /** First `.describe()` text met while unwrapping, outermost first */
  readonly description?: string;
}

/**
 * Strip optional, nullable, default and the transparent wrappers (refine,
 * brand, readonly, catch, pipe, lazy) down to the schema that decides the
 * wire type.
 */
export function unwrapSchema(schema: z.ZodTypeAny): Unwrapped {
  let inner = schema;
  let optional = false;
  let hasDefault = false;
  let description = schema.description;

  for (;;) {
    let next: z.ZodTypeAny | undefined;
    if (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) {
      optional = true;
      next = inner.unwrap();
    } else if (inner instanceof z.ZodDefault) {
      hasDefault = true;
      next = inner.removeDefault();
    } else if (inner instanceof z.ZodEffects) {
      next = inner.innerType();
    } else if (inner instanceof z.ZodBranded || inner instanceof z.ZodReadonly) {
      next = inner.unwrap();
    } else if (inner instanceof z.ZodCatch) {
      next = inner.removeCatch();
    } else if (inner instanceof z.ZodPipeline) {
      next = inner._def.in;
    } else if (inner instanceof z.ZodLazy) {
      next = inner.schema;
    }
    if (!next) break;
    inner = next;
    description ??= inner.description;
  }

  return { inner, optional, hasDefault, description };
}

function stringEnumValues(values: readonly unknown[]): string[] | undefined {
  return values.length > 0 && values.every((v): v is string => typeof v === "string") ? [...values] : undefined;
}

/**
 * Fixed mapping from a (fully unwrapped) schema to a wire type. Closed string
 * enumerations keep their value list; anything not in the table is rejected.
 */
export function getValueSchema(schema: z.ZodTypeAny, parameter = "return"): ValueSchema {
  if (schema instanceof z.ZodString) return { valType: "string" };
  if (schema instanceof z.ZodBoolean) return { valType: "boolean" };
  if (schema instanceof z.ZodNumber) return { valType: schema.isInt ? "integer" : "float" };

  if (schema instanceof z.ZodEnum) {
    return { valType: "string", enum: [...schema.options] };
  }
  if (schema instanceof z.ZodNativeEnum) {
    // numeric enums carry a reverse mapping, so any number rules the enum out
    const values = stringEnumValues(Object.values<unknown>(schema.enum));
    if (values) return { valType: "string", enum: values };
  }
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    if (typeof value === "string") return { valType: "string", enum: [value] };
    if (typeof value === "boolean") return { valType: "boolean" };
    if (typeof value === "number") return { valType: Number.isInteger(value) ? "integer" : "float" };
  }
  if (schema instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = schema.options;
    const literals = options.map(o => (o instanceof z.ZodLiteral ? o.value : undefined));
    const values = stringEnumValues(literals);
    if (values) return { valType: "string", enum: values };
  }

  if (
    schema instanceof z.ZodObject ||
    schema instanceof z.ZodArray ||
    schema instanceof z.ZodRecord ||
    schema instanceof z.ZodTuple ||
    schema instanceof z.ZodDiscriminatedUnion
  ) {
    return { valType: "json" };
  }

  throw new UnsupportedParameterTypeError(parameter, schema.constructor.name);
}

function isInferrableMarker(value: unknown): value is InferrableMarker {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "inferrable";
}

function fieldDefault(info: FieldInfo | undefined, key: string): (() => unknown) | undefined {
  if (!info) return undefined;
  if (info.defaultFactory !== undefined) {
    if (typeof info.defaultFactory !== "function") {
      throw new ToolDefinitionError(`Default factory for parameter ${key} is not callable.`);
    }
    return info.defaultFactory;
  }
  if (info.default !== undefined) {
    const value = info.default;
    return () => value;
  }
  return undefined;
}

export function createParameterBinding(key: string, input: ParamInput): ParameterBinding {
  const spec: ParamSpec = isParamSpec(input) ? input : { kind: "param", schema: input, annotations: [] };
  const unwrapped = unwrapSchema(spec.schema);

  let name = key;
  let description = spec.field?.description;
  const text = spec.annotations.filter((a): a is string => typeof a === "string");
  if (text.length === 1) {
    description ??= text[0];
  } else if (text.length === 2) {
    name = text[0] ?? key;
    description ??= text[1];
  } else if (text.length > 2) {
    throw new ToolDefinitionError(
      `Parameter ${key} has too many string annotations. Expected 0, 1, or 2, got ${text.length}.`
    );
  }
  description ??= unwrapped.description;
  if (description === undefined || isBlank(description)) {
    throw new ToolDefinitionError(`Parameter ${key} is missing a description`);
  }
  if (!IDENTIFIER.test(name)) {
    throw new ToolDefinitionError(`Parameter name '${name}' is not a valid identifier`);
  }

  const marker = spec.annotations.find(isInferrableMarker);
  const defaultValue = fieldDefault(spec.field, key);
  const valueSchema = getValueSchema(unwrapped.inner, key);

  return {
    key,
    schema: spec.schema,
    fieldDefault: defaultValue,
    parameter: {
      name,
      description,
      required: !(unwrapped.optional || unwrapped.hasDefault || defaultValue !== undefined),
      inferrable: marker ? marker.value : true,
      valueSchema,
    },
  };
}

export function createInputDefinition(descriptor: AnyToolDescriptor): { inputs: ToolInputs; bindings: ParameterBinding[] } {
  const bindings = Object.entries(descriptor.options.params).map(([key, input]) => createParameterBinding(key, input));
  const seen = new Set<string>();
  for (const b of bindings) {
    if (seen.has(b.parameter.name)) {
      throw new ToolDefinitionError(`Parameter name '${b.parameter.name}' is declared more than once`);
    }
    seen.add(b.parameter.name);
  }
  return { inputs: { parameters: bindings.map(b => b.parameter) }, bindings };
}

export function createOutputDefinition(descriptor: AnyToolDescriptor): { output: ToolOutput; schema?: z.ZodTypeAny } {
  const declared = descriptor.options.returns;
  if (declared === undefined) {
    return { output: { description: NO_DESCRIPTION, availableModes: ["null"], valueSchema: null } };
  }

  const schema = isReturnSpec(declared) ? declared.schema : declared;
  const unwrapped = unwrapSchema(schema);
  const modes: OutputMode[] = ["value", "error"];
  if (unwrapped.optional) modes.push("null");

  const explicit = isReturnSpec(declared) ? declared.description : undefined;
  return {
    output: {
      description: explicit ?? unwrapped.description ?? NO_DESCRIPTION,
      availableModes: modes,
      valueSchema: getValueSchema(unwrapped.inner),
    },
    schema: unwrapped.inner,
  };
}

export function resolveToolName(descriptor: AnyToolDescriptor): string {
  const name = descriptor.options.name ?? toPascalCase(descriptor.fn.name);
  if (isBlank(name)) {
    throw new ToolDefinitionError("Tool name could not be determined: pass a named function or set `name`");
  }
  if (!IDENTIFIER.test(name)) {
    throw new ToolDefinitionError(`Tool name '${name}' is not a valid identifier`);
  }
  return name;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Derive the complete wire contract of a tool. Every problem surfaces here
 * as a `ToolDefinitionError`, never later at invocation time.
 */
export function createToolDefinition(descriptor: AnyToolDescriptor, toolkit: ToolkitInfo, version?: string): InferredTool {
  const name = resolveToolName(descriptor);
  const description = descriptor.options.description;
  if (isBlank(description)) {
    throw new ToolDefinitionError(`Tool ${name} is missing a description`);
  }
  if (!IDENTIFIER.test(toolkit.name)) {
    throw new ToolDefinitionError(`Toolkit name '${toolkit.name}' is not a valid identifier`);
  }

  if (descriptor.options.returns === undefined && doesFunctionReturnValue(descriptor.fn)) {
    throw new ToolDefinitionError(`Tool ${name} returns a value but declares no return schema`);
  }

  const { inputs, bindings } = createInputDefinition(descriptor);
  const { output, schema } = createOutputDefinition(descriptor);

  const definition: ToolDefinition = deepFreeze({
    name,
    fullyQualifiedName: `${toolkit.name}.${name}`,
    description: description.trim(),
    toolkit: { ...toolkit },
    version: version ?? descriptor.options.version ?? toolkit.version,
    inputs,
    output,
    requirements: { authorization: descriptor.options.requiresAuth },
  });

  return { definition, bindings, outputSchema: schema };
}

export function getWireType(schema: z.ZodTypeAny): WireType {
  return getValueSchema(unwrapSchema(schema).inner).valType;
}
