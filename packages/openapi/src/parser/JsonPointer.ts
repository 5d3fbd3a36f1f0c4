/**
 * JsonPointer — RFC 6901 Pointer Helpers
 *
 * Parses, formats and evaluates the pointer part of a `$ref`.
 * Only `~0` (tilde) and `~1` (slash) are escape sequences; percent
 * sequences are literal characters.
 *
 * @module
 */
import { RefResolutionError } from '../errors.js';
import { isJsonObject, type JsonValue, type Reference } from './types.js';

// ── Reference Parsing ────────────────────────────────────

/**
 * Split a reference on its first `#`.
 *
 * @example
 * parseReference('#/components/schemas/Pet')  → { document: '', pointer: '/components/schemas/Pet' }
 * parseReference('common.yaml#/Error')         → { document: 'common.yaml', pointer: '/Error' }
 * parseReference('https://x.io/spec.json')     → { document: 'https://x.io/spec.json', pointer: '' }
 */
export function parseReference(ref: string): Reference {
    const hash = ref.indexOf('#');
    if (hash === -1) return { document: ref, pointer: '' };
    return { document: ref.slice(0, hash), pointer: ref.slice(hash + 1) };
}

// ── Segments ─────────────────────────────────────────────

/** Unescape one segment. `~1` must be replaced before `~0`. */
export function unescapeSegment(segment: string): string {
    return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function escapeSegment(segment: string): string {
    return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Parse a pointer into unescaped segments.
 * An empty pointer and `/` both address the whole document. A missing
 * leading slash is tolerated.
 */
export function parsePointer(pointer: string): string[] {
    if (pointer === '' || pointer === '/') return [];
    const body = pointer.startsWith('/') ? pointer.slice(1) : pointer;
    return body.split('/').map(unescapeSegment);
}

export function formatPointer(segments: readonly string[]): string {
    if (segments.length === 0) return '';
    return '/' + segments.map(escapeSegment).join('/');
}

// ── Evaluation ───────────────────────────────────────────

const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

/**
 * Evaluate `pointer` against `document`.
 *
 * @param ref - The reference being resolved, reported on failure
 * @throws {RefResolutionError} On a missing key, an out-of-range or
 *   malformed index, or a step into a scalar
 */
export function resolvePointer(document: JsonValue, pointer: string, ref: string): JsonValue {
    const segments = parsePointer(pointer);
    let current: JsonValue = document;

    for (let i = 0; i < segments.length; i++) {
        const segment = segments[i] ?? '';
        const at = formatPointer(segments.slice(0, i + 1));

        if (Array.isArray(current)) {
            if (!ARRAY_INDEX.test(segment)) {
                throw new RefResolutionError(ref, at, `"${segment}" is not an array index`);
            }
            const index = Number(segment);
            const item: JsonValue | undefined = current[index];
            if (item === undefined) {
                throw new RefResolutionError(ref, at, `index ${index} out of bounds (length ${current.length})`);
            }
            current = item;
        } else if (isJsonObject(current)) {
            const value: JsonValue | undefined = current[segment];
            if (value === undefined || !Object.prototype.hasOwnProperty.call(current, segment)) {
                throw new RefResolutionError(ref, at, `key "${segment}" not found`);
            }
            current = value;
        } else {
            throw new RefResolutionError(ref, at, 'cannot step into a scalar value');
        }
    }

    return current;
}
