/**
 * Tests for the DEBUG-driven tag logger
 */

import { describe, it, expect } from 'vitest';
import { LoggerRegistry, createLoggers, isTagEnabled } from './logger.js';

function collector(): { lines: string[]; write(chunk: string): boolean } {
    const lines: string[] = [];
    return {
        lines,
        write(chunk: string) {
            lines.push(chunk);
            return true;
        },
    };
}

describe('isTagEnabled', () => {
    it('should enable listed tags only', () => {
        expect(isTagEnabled('hooks,modes', 'hooks')).toBe(true);
        expect(isTagEnabled('hooks,modes', 'trap')).toBe(false);
        expect(isTagEnabled(' hooks , trap ', 'trap')).toBe(true);
    });

    it('should enable everything for * except negated tags', () => {
        expect(isTagEnabled('*', 'trap')).toBe(true);
        expect(isTagEnabled('*,-trap', 'trap')).toBe(false);
        expect(isTagEnabled('*,-trap', 'hooks')).toBe(true);
    });

    it('should fall back to the default when DEBUG does not mention the tag', () => {
        expect(isTagEnabled(undefined, 'error', true)).toBe(true);
        expect(isTagEnabled('', 'hooks')).toBe(false);
        expect(isTagEnabled('-error', 'error', true)).toBe(false);
    });
});

describe('LoggerRegistry', () => {
    it('should echo through the prefix when enabled', () => {
        const sink = collector();
        const registry = new LoggerRegistry({ debug: 'hooks', sink });
        const log = registry.register('hooks', { prefix: '[hooks] ' });

        log.echo('declared', 'deploy', 3);

        expect(sink.lines).toEqual(['[hooks] declared deploy 3\n']);
    });

    it('should stay silent when disabled', () => {
        const sink = collector();
        const registry = new LoggerRegistry({ debug: 'modes', sink });
        const log = registry.register('hooks');

        log.echo('nothing');
        log.printf('%s', 'nothing');

        expect(log.enabled).toBe(false);
        expect(sink.lines).toEqual([]);
    });

    it('should format printf output without adding a newline', () => {
        const sink = collector();
        const registry = new LoggerRegistry({ debug: '*', sink });

        registry.register('trap', { prefix: 'T ' }).printf('%s has %d handler(s)', 'INT', 2);

        expect(sink.lines).toEqual(['T INT has 2 handler(s)']);
    });

    it('should echo whole lines written to a tag sink', () => {
        const sink = collector();
        const registry = new LoggerRegistry({ debug: 'hooks', sink });
        const lineSink = registry.register('hooks', { prefix: '> ' }).sink();

        lineSink.write('one\ntw');
        lineSink.write('o\n');

        expect(sink.lines).toEqual(['> one\n', '> two\n']);
    });

    it('should return the existing logger when a tag is registered twice', () => {
        const registry = new LoggerRegistry({ sink: collector() });
        const first = registry.register('hooks', { prefix: 'a ' });

        expect(registry.register('hooks', { prefix: 'b ' })).toBe(first);
        expect(registry.registeredTags()).toEqual(['hooks']);
    });

    it('should register unknown tags disabled on get()', () => {
        const registry = new LoggerRegistry({ sink: collector() });

        expect(registry.get('custom').enabled).toBe(false);
        expect(registry.registeredTags()).toEqual(['custom']);
    });

    it('should re-evaluate every tag on refresh()', () => {
        const sink = collector();
        const registry = new LoggerRegistry({ debug: '', sink });
        const hooks = registry.register('hooks', { prefix: '' });
        const warn = registry.register('warn', { prefix: '', defaultEnabled: true });

        registry.refresh('hooks,-warn');

        expect(hooks.enabled).toBe(true);
        expect(warn.enabled).toBe(false);
        expect(registry.isEnabled('hooks')).toBe(true);
    });
});

describe('createLoggers', () => {
    it('should register the engine tags with error and warn on by default', () => {
        const registry = createLoggers({ debug: '', sink: collector() });

        expect(registry.registeredTags()).toEqual(['hooks', 'modes', 'trap', 'warn', 'error']);
        expect(registry.isEnabled('error')).toBe(true);
        expect(registry.isEnabled('warn')).toBe(true);
        expect(registry.isEnabled('hooks')).toBe(false);
    });

    it('should honour the DEBUG value it is given', () => {
        const sink = collector();
        const registry = createLoggers({ debug: 'trap,-error', sink });

        expect(registry.isEnabled('trap')).toBe(true);
        expect(registry.isEnabled('error')).toBe(false);

        registry.get('error').echo('hidden');
        expect(sink.lines).toEqual([]);
    });
});
