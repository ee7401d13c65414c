import type { z } from "zod";
import { type InferredTool, type ParameterBinding, createToolDefinition } from "./SchemaInference";
import { ToolDefinitionError } from "./ToolErrors";
import { Toolkit, type ToolkitOptions } from "./Toolkit";
import type { AnyToolDescriptor, ToolDefinition } from "./ToolTypes";
import { componentLogger } from "../utils/logger";

const log = componentLogger("catalog");

export const DEFAULT_TOOLKIT = "Tools";
export const DEFAULT_VERSION = "default";

export interface ToolMeta {
  /** Registering module; two modules may not claim the same name and version */
  readonly module: string;
  readonly path?: string;
  readonly dateAdded: Date;
  readonly dateUpdated: Date;
}

export interface MaterializedTool {
  readonly tool: AnyToolDescriptor;
  readonly definition: ToolDefinition;
  readonly bindings: readonly ParameterBinding[];
  readonly outputSchema?: z.ZodTypeAny;
  readonly meta: ToolMeta;
}

export interface AddToolOptions {
  module?: string;
  path?: string;
  version?: string;
  toolkitVersion?: string;
  toolkitDescription?: string;
}

export interface ToolListing {
  name: string;
  description: string;
  version: string;
  endpoint: string;
}

/**
 * Registry of materialized tools keyed by qualified name and version. Owned
 * by a worker; definitions are immutable once added.
 */
export class ToolCatalog implements Iterable<MaterializedTool> {
  private tools: Map<string, Map<string, MaterializedTool>> = new Map();
  // qualified name -> version registered last
  private latest: Map<string, string> = new Map();

  addTool(tool: AnyToolDescriptor, toolkitName: string = DEFAULT_TOOLKIT, options: AddToolOptions = {}): MaterializedTool {
    const version = options.version ?? tool.options.version ?? DEFAULT_VERSION;
    const inferred = createToolDefinition(
      tool,
      { name: toolkitName, version: options.toolkitVersion ?? version, description: options.toolkitDescription },
      version
    );
    return this.insert(tool, inferred, options.module ?? toolkitName, options.path);
  }

  addToolkit(toolkit: Toolkit, module: string = toolkit.name, path?: string): MaterializedTool[] {
    return toolkit.tools.map(tool =>
      this.addTool(tool, toolkit.name, {
        module,
        path,
        version: toolkit.version,
        toolkitVersion: toolkit.version,
        toolkitDescription: toolkit.description,
      })
    );
  }

  addModule(namespace: object, options: ToolkitOptions & { module?: string; path?: string }): MaterializedTool[] {
    return this.addToolkit(Toolkit.fromModule(namespace, options), options.module, options.path);
  }

  get(name: string, version?: string): MaterializedTool | undefined {
    const qualified = this.qualify(name);
    if (!qualified) return undefined;
    const versions = this.tools.get(qualified);
    const wanted = version ?? this.latest.get(qualified);
    return wanted === undefined ? undefined : versions?.get(wanted);
  }

  has(name: string, version?: string): boolean {
    return this.get(name, version) !== undefined;
  }

  get size(): number {
    let n = 0;
    for (const versions of this.tools.values()) n += versions.size;
    return n;
  }

  *[Symbol.iterator](): Iterator<MaterializedTool> {
    for (const versions of this.tools.values()) yield* versions.values();
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this, t => t.definition);
  }

  /** One definition per qualified name: the version `get` resolves to without one. */
  getLatestDefinitions(): ToolDefinition[] {
    const definitions: ToolDefinition[] = [];
    for (const [name, version] of this.latest) {
      const latest = this.tools.get(name)?.get(version);
      if (latest) definitions.push(latest.definition);
    }
    return definitions;
  }

  list(endpoint: string): ToolListing[] {
    return Array.from(this, t => ({
      name: t.definition.fullyQualifiedName,
      description: t.definition.description,
      version: t.definition.version,
      endpoint,
    }));
  }

  /** Accepts `Toolkit.Tool`, or a bare tool name that only one toolkit uses. */
  private qualify(name: string): string | undefined {
    if (this.tools.has(name)) return name;
    if (name.includes(".")) return undefined;
    const matches = Array.from(this.tools.keys()).filter(q => q.slice(q.indexOf(".") + 1) === name);
    if (matches.length > 1) {
      log.debug({ name, matches }, "ambiguous tool name");
      return undefined;
    }
    return matches[0];
  }

  private insert(
    tool: AnyToolDescriptor,
    inferred: InferredTool,
    module: string,
    path?: string
  ): MaterializedTool {
    const { definition } = inferred;
    const key = definition.fullyQualifiedName;
    const versions = this.tools.get(key) ?? new Map<string, MaterializedTool>();
    const existing = versions.get(definition.version);
    if (existing && existing.meta.module !== module) {
      throw new ToolDefinitionError(
        `Tool ${key}@${definition.version} is already registered by module ${existing.meta.module}`
      );
    }

    const now = new Date();
    const materialized: MaterializedTool = {
      tool,
      definition,
      bindings: inferred.bindings,
      outputSchema: inferred.outputSchema,
      meta: { module, path, dateAdded: existing?.meta.dateAdded ?? now, dateUpdated: now },
    };
    versions.set(definition.version, materialized);
    this.tools.set(key, versions);
    this.latest.set(key, definition.version);
    log.info({ tool: key, version: definition.version, replaced: !!existing }, "tool registered");
    return materialized;
  }
}
