import ts from 'typescript';
import { defineConfig } from 'vitest/config';

// esbuild renames a function expression that shares its name with a
// module-level binding (`export const add = tool(..., function add() {})`
// becomes `function add2`), and Vite forces `keepNames` off. Tool names are
// derived from `fn.name`, so TypeScript files are transpiled with the
// TypeScript compiler instead, which keeps names as written.
const typescriptTransform = {
  name: 'typescript-transform',
  enforce: 'pre' as const,
  transform(code: string, id: string) {
    if (!/\.[cm]?tsx?$/.test(id.split('?')[0] ?? '')) return null;
    const result = ts.transpileModule(code, {
      fileName: id,
      compilerOptions: {
        module: ts.ModuleKind.ESNext,
        target: ts.ScriptTarget.ES2022,
        esModuleInterop: true,
        sourceMap: true,
        inlineSources: true
      }
    });
    return { code: result.outputText, map: result.sourceMapText ?? null };
  }
};

export default defineConfig({
  plugins: [typescriptTransform],
  test: {
    include: ['tests/**/*.{test,spec}.ts'],
    environment: 'node',
    globals: true,
    pool: 'threads',
    restoreMocks: true,
    env: {
      LOG_LEVEL: 'silent'
    },
    coverage: {
      enabled: true,
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov']
    }
  },
  esbuild: false,
  resolve: {
    conditions: ['node']
  }
});
