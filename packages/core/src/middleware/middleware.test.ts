/**
 * Tests for the default (replay) and contract middleware
 */

import { describe, it, expect } from 'vitest';
import { createCaptureBuffer } from '../capture/buffer.js';
import type { CapturedLine, HookEnv } from '../capture/types.js';
import { createLoggers } from '../logger.js';
import { ContractError } from '../types.js';
import { contractMiddleware, createContractMiddleware } from './contract-middleware.js';
import { defaultMiddleware, takeImplementationArgs } from './default.js';
import { FlowControl } from './flow.js';
import type { MiddlewareScope } from './types.js';

interface Harness {
    scope: MiddlewareScope;
    stdout: string[];
    stderr: string[];
    logged: string[];
}

function makeScope(lines: CapturedLine[], options: { exitCode?: number; env?: HookEnv } = {}): Harness {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const logged: string[] = [];
    const capture = createCaptureBuffer('__begin_1');
    capture.lines.push(...lines);

    return {
        stdout,
        stderr,
        logged,
        scope: {
            hookName: 'begin',
            exitCode: options.exitCode ?? 0,
            capture,
            env: options.env ?? {},
            flow: new FlowControl(),
            output: {
                stdout: { write: (chunk: string) => stdout.push(chunk) },
                stderr: { write: (chunk: string) => stderr.push(chunk) },
            },
            loggers: createLoggers({ debug: '', sink: { write: (chunk: string) => logged.push(chunk) } }),
        },
    };
}

const out = (text: string): CapturedLine => ({ stream: 'stdout', text });
const err = (text: string): CapturedLine => ({ stream: 'stderr', text });

describe('takeImplementationArgs', () => {
    it('should strip the separator', () => {
        expect(takeImplementationArgs(['--', 'a', '--', 'b'])).toEqual(['a', '--', 'b']);
        expect(takeImplementationArgs(['--'])).toEqual([]);
    });

    it('should fail loudly without the separator', () => {
        expect(() => takeImplementationArgs(['a', 'b'])).toThrow(ContractError);
        expect(() => takeImplementationArgs([])).toThrow('Middleware arguments must start with "--"');
    });
});

describe('defaultMiddleware', () => {
    it('should replay every line to its stream and keep the status', async () => {
        const { scope, stdout, stderr } = makeScope([out('one'), err('two'), out('three')], { exitCode: 4 });

        expect(await defaultMiddleware(scope, '--')).toBe(4);
        expect(stdout).toEqual(['one\n', 'three\n']);
        expect(stderr).toEqual(['two\n']);
    });

    it('should not interpret directives', async () => {
        const env: HookEnv = {};
        const { scope, stdout } = makeScope([out('contract:env:A=1'), out('contract:exit:3')], { env });

        expect(await defaultMiddleware(scope, '--')).toBe(0);
        expect(env).toEqual({});
        expect(scope.flow.terminate).toBe(false);
        expect(stdout).toEqual(['contract:env:A=1\n', 'contract:exit:3\n']);
    });

    it('should throw without the separator', () => {
        const { scope } = makeScope([]);
        expect(() => defaultMiddleware(scope, 'arg')).toThrow(ContractError);
    });
});

describe('contractMiddleware', () => {
    it('should append to PATH and touch nothing else', async () => {
        const env: HookEnv = { PATH: '/usr/bin', HOME: '/home/test' };
        const { scope } = makeScope([out('contract:env:PATH+=/x/y')], { env });

        expect(await contractMiddleware(scope, '--')).toBe(0);
        expect(env).toEqual({ PATH: '/usr/bin:/x/y', HOME: '/home/test' });
    });

    it('should replay stdout including directives and stderr verbatim', async () => {
        const { scope, stdout, stderr } = makeScope([
            out('hello'),
            out('contract:env:A=1'),
            err('contract:env:B=2'),
        ]);

        await contractMiddleware(scope, '--');

        expect(stdout).toEqual(['hello\n', 'contract:env:A=1\n']);
        expect(stderr).toEqual(['contract:env:B=2\n']);
        expect(scope.env).toEqual({ A: '1' });
    });

    it('should record route and exit requests', async () => {
        const { scope } = makeScope([out('contract:route:./rollback.js'), out('contract:exit:5')]);

        await contractMiddleware(scope, '--');

        expect(scope.flow.terminate).toBe(true);
        expect(scope.flow.route).toBe('./rollback.js');
        expect(scope.flow.exitCode).toBe(5);
    });

    it('should fail with status 1 on a malformed directive', async () => {
        const { scope, logged } = makeScope([out('contract:env:broken')]);

        expect(await contractMiddleware(scope, '--')).toBe(1);
        expect(logged).toHaveLength(1);
        expect(logged[0]).toMatch(/begin: Malformed env directive \(expected NAME=VALUE\): contract:env:broken\n$/);
    });

    it('should keep a non-zero status when a directive is unknown', async () => {
        const { scope, logged } = makeScope([out('contract:mode=dry')], { exitCode: 3 });

        expect(await contractMiddleware(scope, '--')).toBe(3);
        expect(logged[0]).toMatch(/begin: unknown directive: contract:mode=dry\n$/);
    });

    it('should refresh loggers when DEBUG changes', async () => {
        const { scope } = makeScope([out('contract:env:DEBUG=modes')]);
        expect(scope.loggers.isEnabled('modes')).toBe(false);

        await contractMiddleware(scope, '--');

        expect(scope.loggers.isEnabled('modes')).toBe(true);
    });

    it('should require the separator', () => {
        const { scope } = makeScope([]);
        expect(() => contractMiddleware(scope)).toThrow(ContractError);
    });
});

describe('createContractMiddleware', () => {
    it('should map contract:mode=dry to DRY_RUN=true and keep status 0', async () => {
        const env: HookEnv = {};
        const middleware = createContractMiddleware({
            onDirective: (directive, scope) => {
                if (directive.payload !== 'mode=dry') return false;
                scope.env.DRY_RUN = 'true';
                return true;
            },
        });
        const { scope, logged } = makeScope([out('contract:mode=dry')], { env });

        expect(await middleware(scope, '--')).toBe(0);
        expect(env.DRY_RUN).toBe('true');
        expect(logged).toEqual([]);
    });
});
