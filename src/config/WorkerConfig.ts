import fs from "fs";
import path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export class WorkerConfigError extends Error {
  public readonly code = "WORKER_CONFIG" as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WorkerConfigError";
  }
}

const flag = z.union([z.boolean(), z.enum(["true", "false", "1", "0"]).transform(v => v === "true" || v === "1")]);

export const WorkerConfigSchema = z
  .object({
    host: z.string().default("127.0.0.1"),
    port: z.coerce.number().int().min(0).max(65535).default(8002),
    basePath: z.string().default("/worker"),
    secret: z.string().min(1).optional(),
    disableAuth: flag.default(false),
    catalogRequiresAuth: flag.default(true),
    toolkits: z.array(z.enum(["math", "text"])).default(["math", "text"]),
    /** Directories whose modules are loaded as one toolkit each */
    toolDirs: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;
export type WorkerConfigInput = z.input<typeof WorkerConfigSchema>;

export function resolveWorkerConfigPath(customPath?: string): string | undefined {
  const baseDir = process.cwd();
  const tryPaths = [
    customPath,
    process.env.WORKER_CONFIG,
    path.resolve(baseDir, "config/worker.yaml"),
    path.resolve(baseDir, "config/worker.yml"),
    path.resolve(baseDir, "config/worker.json"),
  ].filter((p): p is string => !!p);
  return tryPaths.find(p => fs.existsSync(p));
}

function readConfigFile(file: string): unknown {
  const raw = fs.readFileSync(file, "utf-8");
  try {
    return /\.ya?ml$/i.test(file) ? parseYaml(raw) : JSON.parse(raw);
  } catch (err) {
    throw new WorkerConfigError(`Could not parse ${file}`, { cause: err });
  }
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.PORT) overrides.port = env.PORT;
  if (env.TOOLHOST_HOST) overrides.host = env.TOOLHOST_HOST;
  if (env.TOOLHOST_BASE_PATH) overrides.basePath = env.TOOLHOST_BASE_PATH;
  if (env.TOOLHOST_WORKER_SECRET) overrides.secret = env.TOOLHOST_WORKER_SECRET;
  if (env.TOOLHOST_DISABLE_AUTH) overrides.disableAuth = env.TOOLHOST_DISABLE_AUTH;
  if (env.TOOLHOST_CATALOG_REQUIRES_AUTH) overrides.catalogRequiresAuth = env.TOOLHOST_CATALOG_REQUIRES_AUTH;
  if (env.TOOLHOST_TOOL_DIRS) overrides.toolDirs = env.TOOLHOST_TOOL_DIRS.split(path.delimiter).filter(Boolean);
  return overrides;
}

/**
 * File settings first, then environment overrides. A missing file is fine;
 * an unreadable or invalid one is a `WorkerConfigError`.
 */
export function loadWorkerConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const file = resolveWorkerConfigPath(customPath);
  const fromFile = file ? readConfigFile(file) : undefined;
  let settings: object = {};
  if (fromFile !== null && fromFile !== undefined) {
    if (typeof fromFile !== "object" || Array.isArray(fromFile)) {
      throw new WorkerConfigError(`${file} must contain a mapping`);
    }
    settings = fromFile;
  }

  const parsed = WorkerConfigSchema.safeParse({ ...settings, ...envOverrides(env) });
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new WorkerConfigError(`Invalid worker configuration${file ? ` in ${file}` : ""}: ${detail}`);
  }
  return parsed.data;
}
