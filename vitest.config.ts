import ts from 'typescript';
import { defineConfig, type Plugin } from 'vitest/config';

// Workspace packages resolve to their TypeScript sources under the "source" condition
const conditions = ['source'];

// Compile TypeScript with tsc's transpiler, as the published build does. Vite's
// esbuild transform renames nested functions that shadow module bindings
// (e.g. `contractMiddleware` -> `contractMiddleware2`), which changes `fn.name`.
function typescriptTransform(): Plugin {
    return {
        name: 'lifehooks:typescript',
        enforce: 'pre',
        transform(code, id) {
            const file = id.split('?')[0];
            if (!/\.(m|c)?ts$/.test(file) || file.endsWith('.d.ts')) return null;
            const out = ts.transpileModule(code, {
                fileName: file,
                compilerOptions: {
                    target: ts.ScriptTarget.ES2022,
                    module: ts.ModuleKind.ESNext,
                    esModuleInterop: true,
                    isolatedModules: true,
                    sourceMap: true,
                    inlineSources: true,
                },
            });
            return { code: out.outputText, map: out.sourceMapText ? JSON.parse(out.sourceMapText) : null };
        },
    };
}

export default defineConfig({
    esbuild: false,
    plugins: [typescriptTransform()],
    resolve: { conditions },
    ssr: { resolve: { conditions } },
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        environment: 'node',
        restoreMocks: true,
    },
});
