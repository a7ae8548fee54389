/**
 * Name validation and slug helpers
 *
 * Hook names, environment variable names and capture buffer names all share
 * the same small set of rules, kept here so the engine and the contract
 * interpreter agree on them.
 */

// =============================================================================
// Validation
// =============================================================================

const HOOK_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Hook names: letters, digits, underscore and dash only.
 *
 * @example
 * ```typescript
 * isValidHookName('begin')       // true
 * isValidHookName('pre-deploy')  // true
 * isValidHookName('bad name')    // false
 * isValidHookName('')            // false
 * ```
 */
export function isValidHookName(name: string): boolean {
    return HOOK_NAME_PATTERN.test(name);
}

/**
 * Environment variable names as a POSIX shell accepts them.
 */
export function isValidEnvName(name: string): boolean {
    return ENV_NAME_PATTERN.test(name);
}

// =============================================================================
// Slugs
// =============================================================================

/**
 * Turn arbitrary text into a filesystem-safe identifier.
 *
 * Lowercases, collapses every run of characters outside `[a-z0-9]` into a
 * single separator, trims separators from both ends and truncates to
 * `maxLength` (trailing separators left by truncation are trimmed too).
 *
 * @example
 * ```typescript
 * toSlug('Pre Deploy!', '_', 40)   // 'pre_deploy'
 * toSlug('build-release', '_')     // 'build_release'
 * ```
 */
export function toSlug(text: string, separator = '-', maxLength = 40): string {
    const collapsed = text
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, separator);

    return trimSeparator(trimSeparator(collapsed, separator).slice(0, maxLength), separator);
}

function trimSeparator(value: string, separator: string): string {
    if (!separator) {
        return value;
    }
    let start = 0;
    let end = value.length;
    while (value.startsWith(separator, start)) {
        start += separator.length;
    }
    while (end > start && value.slice(0, end).endsWith(separator)) {
        end -= separator.length;
    }
    return value.slice(start, end);
}
