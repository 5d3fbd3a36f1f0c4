import { describe, it, expect, vi, afterEach } from 'vitest';
import { createDebugObserver, traceStage, type DebugEvent } from '../../src/observability/DebugObserver.js';

// ============================================================================
// DebugObserver Tests
// ============================================================================

describe('DebugObserver', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('createDebugObserver()', () => {
        it('should return a custom handler as-is', () => {
            const handler = vi.fn();

            expect(createDebugObserver(handler)).toBe(handler);
        });

        it('should print one line per event', () => {
            const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
            const observer = createDebugObserver();

            observer({ type: 'resolve', ref: '#/components/schemas/Node', outcome: 'circular', timestamp: 0 });
            observer({ type: 'resolve', ref: '#/components/schemas/Pet', outcome: 'resolved', timestamp: 0 });
            observer({ type: 'fetch', locator: '/specs/common.yaml', source: 'file', durationMs: 0.5, timestamp: 0 });
            observer({
                type: 'diagnostic',
                diagnostic: { severity: 'warning', code: 'method-fallback', message: 'm', subject: 'HEAD /users' },
                timestamp: 0,
            });
            observer({ type: 'stage', stage: 'resolve', detail: '3 references', durationMs: 2, timestamp: 0 });
            observer({ type: 'stage', stage: 'validate', durationMs: 2, timestamp: 0 });

            expect(debug.mock.calls.map(call => call[0])).toEqual([
                '[sdkgen] resolve   #/components/schemas/Node ↻',
                '[sdkgen] resolve   #/components/schemas/Pet ✓',
                '[sdkgen] fetch     /specs/common.yaml (file) 0.5ms',
                '[sdkgen] warn      HEAD /users method-fallback',
                '[sdkgen] stage     resolve 3 references 2.0ms',
                '[sdkgen] stage     validate 2.0ms',
            ]);
        });
    });

    describe('traceStage()', () => {
        it('should only run the stage without an observer', async () => {
            expect(await traceStage(undefined, 'analyze', () => 42)).toBe(42);
        });

        it('should emit a stage event with the described result', async () => {
            const events: DebugEvent[] = [];
            const result = await traceStage(
                event => events.push(event),
                'load',
                async () => ['a', 'b'],
                items => `${items.length} items`,
            );

            expect(result).toEqual(['a', 'b']);
            expect(events).toHaveLength(1);
            expect(events[0]).toMatchObject({ type: 'stage', stage: 'load', detail: '2 items' });
        });

        it('should not emit when the stage throws', async () => {
            const events: DebugEvent[] = [];
            const failing = traceStage(event => events.push(event), 'validate', () => {
                throw new Error('broken');
            });

            await expect(failing).rejects.toThrow('broken');
            expect(events).toEqual([]);
        });
    });
});
