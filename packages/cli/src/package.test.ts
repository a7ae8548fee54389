/**
 * Tests for the package manifests the built binary depends on
 */

import * as fs from 'fs';
import { describe, it, expect } from 'vitest';

function readManifest(url: URL): Record<string, unknown> {
    return JSON.parse(fs.readFileSync(url, 'utf-8'));
}

describe('package manifests', () => {
    it('should point the lifehooks binary at the built entry beside src', () => {
        const cli = readManifest(new URL('../package.json', import.meta.url));

        expect(cli.name).toBe('@lifehooks/cli');
        expect(cli.bin).toEqual({ lifehooks: './dist/index.js' });
        expect(typeof cli.version).toBe('string');
    });

    it('should resolve core to built output outside the source condition', () => {
        const core = readManifest(new URL('../../core/package.json', import.meta.url));

        expect(core.exports).toEqual({
            '.': {
                source: './src/index.ts',
                types: './dist/index.d.ts',
                default: './dist/index.js',
            },
        });
    });

    it('should declare no binary at the workspace root', () => {
        const root = readManifest(new URL('../../../package.json', import.meta.url));

        expect(root.bin).toBeUndefined();
    });
});
