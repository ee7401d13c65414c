import fs from "fs";
import path from "path";
import type { MaterializedTool, ToolCatalog } from "./ToolCatalog";
import { ToolDefinitionError } from "./ToolErrors";
import { isToolDescriptor } from "./ToolTypes";
import { componentLogger } from "../utils/logger";
import { toPascalCase } from "../utils/text";

const log = componentLogger("loader");

const MODULE_FILE = /\.(ts|js|cjs)$/;
const SKIPPED_FILE = /(\.d\.ts|\.(test|spec)\.[cm]?[jt]s)$/;

export interface ToolDirectoryOptions {
  /** Defaults to the directory name in PascalCase */
  name?: string;
  version?: string;
  description?: string;
}

function moduleFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile() && MODULE_FILE.test(entry.name) && !SKIPPED_FILE.test(entry.name))
    .map(entry => path.join(dir, entry.name))
    .sort();
}

/**
 * Import every module in `dir` and register its exported tools as one
 * toolkit. Each tool remembers the file it came from in `meta.path`.
 */
export async function loadToolDirectory(
  catalog: ToolCatalog,
  dir: string,
  options: ToolDirectoryOptions = {}
): Promise<MaterializedTool[]> {
  const root = path.resolve(dir);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new ToolDefinitionError(`Tools directory not found: ${root}`);
  }
  const name = options.name ?? toPascalCase(path.basename(root));

  const added: MaterializedTool[] = [];
  for (const file of moduleFiles(root)) {
    // a plain path, not a file URL: CommonJS output turns this into require()
    const namespace: object = await import(file);
    if (!Object.values(namespace).some(isToolDescriptor)) {
      log.debug({ file }, "no tools exported");
      continue;
    }
    const stem = path.basename(file).replace(MODULE_FILE, "");
    added.push(
      ...catalog.addModule(namespace, {
        name,
        version: options.version,
        description: options.description,
        module: `${name}/${stem}`,
        path: file,
      })
    );
  }

  if (added.length === 0) throw new ToolDefinitionError(`No tools found in ${root}`);
  log.info({ dir: root, toolkit: name, tools: added.length }, "tool directory loaded");
  return added;
}
