/**
 * RefResolver — `$ref` Resolution Across Documents
 *
 * Returns a copy of a document in which every `$ref` object is replaced
 * by the value it points to, in the same document, in an external file,
 * or behind a URL. A reference met again while it is still being
 * resolved becomes a `{ "$circular_ref": "<ref>" }` marker instead of
 * an infinite structure.
 *
 * All bookkeeping (memo map, in-flight documents, the in-progress stack)
 * lives in a context created per {@link resolveRefs} call, so independent
 * specs can be resolved concurrently.
 *
 * @module
 */
import { isAbsolute, resolve as resolvePath } from 'node:path';
import { StructuralError } from '../errors.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { parseReference, resolvePointer } from './JsonPointer.js';
import {
    CIRCULAR_REF_KEY, REF_KEY,
    isJsonObject, isJsonValue,
    type JsonValue,
} from './types.js';

// ── Types ────────────────────────────────────────────────

/**
 * Loads an external document by absolute file path or URL.
 * Must be idempotent; the resolver calls it at most once per locator.
 */
export type DocumentLoader = (locator: string) => Promise<unknown>;

export interface ResolveOptions {
    /** Directory relative file references are resolved against (default: cwd) */
    readonly baseDir?: string;
    /** Required as soon as the document contains an external reference */
    readonly loader?: DocumentLoader;
    readonly debug?: DebugObserverFn;
}

/** The document a node belongs to; local refs resolve against it */
interface Scope {
    readonly document: JsonValue;
    /** Absolute locator, empty for the root document */
    readonly locator: string;
}

interface ResolveContext {
    readonly baseDir: string;
    readonly loader: DocumentLoader;
    readonly memo: Map<string, JsonValue>;
    readonly documents: Map<string, Promise<JsonValue>>;
    readonly debug: DebugObserverFn | undefined;
}

// ── Public API ───────────────────────────────────────────

/**
 * Resolve every `$ref` in a document.
 *
 * The input is not mutated. Resolving a reference-free document yields
 * a structurally equal copy.
 *
 * @throws {RefResolutionError} If a pointer does not exist in its target
 * @throws {DocumentNotFoundError} If an external file is missing
 */
export async function resolveRefs(doc: JsonValue, options: ResolveOptions = {}): Promise<JsonValue> {
    const ctx: ResolveContext = {
        baseDir: options.baseDir ?? process.cwd(),
        loader: options.loader ?? missingLoader,
        memo: new Map(),
        documents: new Map(),
        debug: options.debug,
    };
    return resolveNode(doc, { document: doc, locator: '' }, [], ctx);
}

/**
 * Collect every `$ref` string in a document, deduplicated.
 * Used for diagnostics; does not resolve anything.
 */
export function extractAllReferences(doc: JsonValue): Set<string> {
    const refs = new Set<string>();

    const visit = (node: JsonValue | undefined): void => {
        if (Array.isArray(node)) {
            node.forEach(visit);
            return;
        }
        if (!isJsonObject(node)) return;

        const ref = node[REF_KEY];
        if (typeof ref === 'string') refs.add(ref);
        for (const value of Object.values(node)) visit(value);
    };

    visit(doc);
    return refs;
}

// ── Traversal ────────────────────────────────────────────

/**
 * Walk one node depth-first. `stack` holds the keys of the references
 * currently being resolved on this call path.
 * @internal
 */
async function resolveNode(
    node: JsonValue,
    scope: Scope,
    stack: readonly string[],
    ctx: ResolveContext,
): Promise<JsonValue> {
    if (Array.isArray(node)) {
        const items: JsonValue[] = [];
        for (const item of node) {
            items.push(await resolveNode(item, scope, stack, ctx));
        }
        return items;
    }

    if (!isJsonObject(node)) return node;

    const ref = node[REF_KEY];
    if (typeof ref === 'string') {
        return resolveReference(ref, scope, stack, ctx);
    }

    // Built from entries so that keys such as `__proto__` stay own data properties
    const entries: [string, JsonValue][] = [];
    for (const [key, value] of Object.entries(node)) {
        if (value === undefined) continue;
        entries.push([key, await resolveNode(value, scope, stack, ctx)]);
    }
    return Object.fromEntries(entries);
}

async function resolveReference(
    ref: string,
    scope: Scope,
    stack: readonly string[],
    ctx: ResolveContext,
): Promise<JsonValue> {
    const { document, pointer } = parseReference(ref);
    const locator = document === '' ? scope.locator : toLocator(document, ctx.baseDir);
    const key = `${locator}#${pointer}`;

    if (stack.includes(key)) {
        emit(ctx, ref, 'circular');
        return { [CIRCULAR_REF_KEY]: ref };
    }

    const cached = ctx.memo.get(key);
    if (cached !== undefined) {
        emit(ctx, ref, 'cached');
        return cached;
    }

    const target = document === '' ? scope.document : await loadDocument(locator, ctx);
    const value = resolvePointer(target, pointer, ref);

    // The stack is never mutated: the entry disappears with this frame,
    // whether the nested resolution succeeds or throws.
    const resolved = await resolveNode(value, { document: target, locator }, [...stack, key], ctx);

    ctx.memo.set(key, resolved);
    emit(ctx, ref, 'resolved');
    return resolved;
}

// ── External Documents ───────────────────────────────────

const URL_PATTERN = /^https?:\/\//i;

/** URLs stay as written; file paths become absolute against `baseDir` */
function toLocator(document: string, baseDir: string): string {
    if (URL_PATTERN.test(document)) return document;
    return isAbsolute(document) ? document : resolvePath(baseDir, document);
}

/**
 * Load each external document once. Concurrent callers share the same
 * in-flight promise; a failed load is forgotten so a later pass can retry.
 */
function loadDocument(locator: string, ctx: ResolveContext): Promise<JsonValue> {
    const existing = ctx.documents.get(locator);
    if (existing) return existing;

    const pending = ctx.loader(locator)
        .then((loaded) => {
            if (!isJsonValue(loaded)) {
                throw new StructuralError([`${locator}: not a JSON-compatible document`]);
            }
            return loaded;
        })
        .catch((error: unknown) => {
            ctx.documents.delete(locator);
            throw error;
        });
    ctx.documents.set(locator, pending);
    return pending;
}

const missingLoader: DocumentLoader = (locator) =>
    Promise.reject(new Error(`No document loader configured for external reference "${locator}"`));

function emit(ctx: ResolveContext, ref: string, outcome: 'resolved' | 'cached' | 'circular'): void {
    ctx.debug?.({ type: 'resolve', ref, outcome, timestamp: Date.now() });
}
