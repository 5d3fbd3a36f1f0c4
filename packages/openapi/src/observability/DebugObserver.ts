/**
 * DebugObserver — Structured Events for the Analysis Pipeline
 *
 * Typed events emitted while a spec is resolved and analyzed. When no
 * observer is passed (the default) nothing is emitted and no event
 * object is allocated.
 *
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 *
 * @example
 * ```typescript
 * import { analyzeSpec, createDebugObserver } from '@sdkgen-ir/openapi';
 *
 * // Default: pretty console.debug output
 * const ir = await analyzeSpec('./petstore.yaml', { debug: createDebugObserver() });
 *
 * // Custom handler
 * const events: DebugEvent[] = [];
 * await analyzeSpec('./petstore.yaml', { debug: (event) => events.push(event) });
 * ```
 *
 * @module
 */
import type { Diagnostic } from '../parser/types.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/**
 * Emitted for every `$ref` the resolver meets.
 * `outcome` tells whether it was walked, served from the memo map, or
 * replaced by a circular marker.
 */
export interface ResolveEvent {
    readonly type: 'resolve';
    readonly ref: string;
    readonly outcome: 'resolved' | 'cached' | 'circular';
    readonly timestamp: number;
}

/** Emitted when an external document is loaded */
export interface FetchEvent {
    readonly type: 'fetch';
    readonly locator: string;
    readonly source: 'file' | 'network' | 'cache';
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted for every non-fatal naming or grouping finding */
export interface DiagnosticEvent {
    readonly type: 'diagnostic';
    readonly diagnostic: Diagnostic;
    readonly timestamp: number;
}

/** Named pipeline stages */
export type PipelineStage = 'load' | 'validate' | 'resolve' | 'analyze';

/** Emitted after each pipeline stage completes */
export interface StageEvent {
    readonly type: 'stage';
    readonly stage: PipelineStage;
    /** Optional details (e.g. "12 resources") */
    readonly detail?: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * ```typescript
 * function handle(event: DebugEvent) {
 *     switch (event.type) {
 *         case 'resolve':    // ResolveEvent
 *         case 'fetch':      // FetchEvent
 *         case 'diagnostic': // DiagnosticEvent
 *         case 'stage':      // StageEvent
 *     }
 * }
 * ```
 */
export type DebugEvent =
    | ResolveEvent
    | FetchEvent
    | DiagnosticEvent
    | StageEvent;

/** Observer function that receives debug events */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output:
 *
 * ```
 * [sdkgen] resolve   #/components/schemas/Pet ✓
 * [sdkgen] fetch     common.yaml (file) 1.2ms
 * [sdkgen] warn      GET /things method-fallback
 * [sdkgen] stage     resolve 4.1ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[sdkgen]';

        switch (event.type) {
            case 'resolve': {
                const icon = event.outcome === 'circular' ? '↻' : event.outcome === 'cached' ? '≡' : '✓';
                console.debug(`${prefix} resolve   ${event.ref} ${icon}`);
                break;
            }

            case 'fetch':
                console.debug(`${prefix} fetch     ${event.locator} (${event.source}) ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'diagnostic':
                console.debug(`${prefix} warn      ${event.diagnostic.subject} ${event.diagnostic.code}`);
                break;

            case 'stage': {
                const detail = event.detail ? ` ${event.detail}` : '';
                console.debug(`${prefix} stage     ${event.stage}${detail} ${event.durationMs.toFixed(1)}ms`);
                break;
            }
        }
    };
}

/**
 * Run one pipeline stage and emit a {@link StageEvent} when it completes.
 * Without an observer the stage runs untouched.
 *
 * @param describe - Builds the optional event detail from the stage result
 */
export async function traceStage<T>(
    debug: DebugObserverFn | undefined,
    stage: PipelineStage,
    run: () => T | Promise<T>,
    describe?: (result: T) => string,
): Promise<T> {
    if (!debug) return run();

    const started = performance.now();
    const result = await run();
    const detail = describe?.(result);
    debug({
        type: 'stage',
        stage,
        ...(detail !== undefined ? { detail } : {}),
        durationMs: performance.now() - started,
        timestamp: Date.now(),
    });
    return result;
}
