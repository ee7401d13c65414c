import { ToolDefinitionError } from "./ToolErrors";
import { type AnyToolDescriptor, isToolDescriptor } from "./ToolTypes";

export interface ToolkitOptions {
  name: string;
  version?: string;
  description?: string;
}

/**
 * A named, versioned group of tools. Every tool registered through a toolkit
 * takes the toolkit's version as its own.
 */
export class Toolkit {
  public readonly name: string;
  public readonly version: string;
  public readonly description?: string;
  public readonly tools: readonly AnyToolDescriptor[];

  constructor(options: ToolkitOptions, tools: readonly AnyToolDescriptor[]) {
    if (!options.name.trim()) throw new ToolDefinitionError("Toolkit name must not be empty");
    this.name = options.name;
    this.version = options.version ?? "default";
    this.description = options.description;
    this.tools = Object.freeze([...tools]);
  }

  /** Collect every exported tool declaration of a module namespace; other exports are skipped. */
  static fromModule(namespace: object, options: ToolkitOptions): Toolkit {
    const tools = Object.values(namespace).filter(isToolDescriptor);
    if (tools.length === 0) {
      throw new ToolDefinitionError(`No tools found in module for toolkit ${options.name}`);
    }
    return new Toolkit(options, tools);
  }
}
