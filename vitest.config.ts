import ts from 'typescript';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite's esbuild transform renames function expressions that shadow their
  // binding (and forces keepNames off); transpile TypeScript with tsc instead
  // so `Function.name` matches the compiled output.
  esbuild: false,
  plugins: [
    {
      name: 'typescript-transpile',
      enforce: 'pre',
      transform(code, id) {
        if (!/\.[cm]?ts$/.test(id.split('?')[0] ?? '')) return null;
        const out = ts.transpileModule(code, {
          fileName: id,
          compilerOptions: {
            target: ts.ScriptTarget.ES2022,
            module: ts.ModuleKind.ESNext,
            sourceMap: true,
            inlineSources: true,
          },
        });
        return { code: out.outputText, map: out.sourceMapText ?? null };
      },
    },
  ],
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/domain/**',
        'src/application/pattern-registry.ts',
        'src/application/event-bus.ts',
        'src/application/concurrency-controller.ts',
        'src/application/admission-gate.ts',
        'src/application/metrics-collector.ts',
        'src/application/plugin-manager.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
