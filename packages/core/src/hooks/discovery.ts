/**
 * Script discovery
 *
 * Scripts for hook `H` live in the hooks directory and are named `H-<rest>`
 * or `H_<rest>` (e.g. `build_10_compile.sh`, `deploy-notify`). The sort key
 * is `<rest>` without its extension.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface DiscoveredScript {
    fileName: string;
    path: string;
    sortKey: string;
    executable: boolean;
    readable: boolean;
}

/**
 * Sort key for a file name, or undefined when the file does not belong
 * to `hook`.
 *
 * @example
 * ```typescript
 * scriptSortKey('build', 'build_10_compile.sh')  // '10_compile'
 * scriptSortKey('build', 'build-notify')         // 'notify'
 * scriptSortKey('build', 'buildx-notify')        // undefined
 * ```
 */
export function scriptSortKey(hook: string, fileName: string): string | undefined {
    if (!fileName.startsWith(`${hook}-`) && !fileName.startsWith(`${hook}_`)) {
        return undefined;
    }
    const key = path.parse(fileName.slice(hook.length + 1)).name;
    return key.length > 0 ? key : undefined;
}

function hasAccess(file: string, mode: number): boolean {
    try {
        fs.accessSync(file, mode);
        return true;
    } catch {
        return false;
    }
}

/**
 * List the scripts for a hook, sorted by file name. A missing directory
 * yields no scripts.
 */
export function discoverScripts(dir: string, hook: string): DiscoveredScript[] {
    if (!fs.existsSync(dir)) {
        return [];
    }

    const scripts: DiscoveredScript[] = [];
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const sortKey = scriptSortKey(hook, entry.name);
        if (sortKey === undefined) continue;

        const file = path.join(dir, entry.name);
        const isFile = entry.isFile()
            || (entry.isSymbolicLink() && (fs.statSync(file, { throwIfNoEntry: false })?.isFile() ?? false));
        if (!isFile) continue;

        scripts.push({
            fileName: entry.name,
            path: file,
            sortKey,
            executable: hasAccess(file, fs.constants.X_OK),
            readable: hasAccess(file, fs.constants.R_OK),
        });
    }

    return scripts.sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0));
}

/**
 * Every hook name a directory has scripts for, given the `H-*` / `H_*`
 * convention. A file belongs to the longest of `known` it starts with;
 * otherwise its name is everything before the first `-` or `_`, so
 * `pre-deploy-notify` counts as `pre` unless `pre-deploy` is known.
 */
export function hookNamesInDirectory(dir: string, known: string[] = []): string[] {
    if (!fs.existsSync(dir)) {
        return [];
    }
    const byLength = [...known].sort((a, b) => b.length - a.length);
    const names = new Set<string>();
    for (const fileName of fs.readdirSync(dir)) {
        const owner = byLength.find((hook) => scriptSortKey(hook, fileName) !== undefined);
        if (owner) {
            names.add(owner);
            continue;
        }
        const match = /^([A-Za-z0-9]+)[-_]/.exec(fileName);
        if (match) {
            names.add(match[1]);
        }
    }
    return [...names].sort();
}
