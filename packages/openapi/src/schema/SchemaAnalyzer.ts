/**
 * SchemaAnalyzer — allOf / oneOf / anyOf Classification
 *
 * `oneOf` / `anyOf` are true sum types and stay unions in the IR.
 * `allOf` is a structural intersection; {@link mergeAllOf} flattens it
 * into one product type, since generators cannot express "inherits
 * from N schemas" directly.
 *
 * @module
 */
import {
    CIRCULAR_REF_KEY, REF_KEY,
    isJsonObject, readString,
    type Composition, type CompositionKind, type CompositionMember,
    type Discriminator, type JsonObject, type JsonValue,
} from '../parser/types.js';

/** Checked in this order; the first one present wins */
const COMPOSITION_KINDS: readonly CompositionKind[] = ['allOf', 'oneOf', 'anyOf'];

// ── Classification ───────────────────────────────────────

export function getCompositionKind(schema: JsonObject): CompositionKind | undefined {
    return COMPOSITION_KINDS.find(kind => Array.isArray(schema[kind]));
}

export function isComposition(schema: JsonObject): boolean {
    return getCompositionKind(schema) !== undefined;
}

/**
 * Classify a schema's composition.
 *
 * Referenced members become their bare schema name; inline members are
 * kept as anonymous schemas. Returns `undefined` for plain schemas and
 * for empty member lists.
 *
 * @example
 * analyzeComposition({ oneOf: [{ $ref: '#/components/schemas/Cat' }, { type: 'string' }] })
 * // → { kind: 'oneOf', members: ['Cat', { type: 'string' }] }
 */
export function analyzeComposition(schema: JsonObject): Composition | undefined {
    const kind = getCompositionKind(schema);
    if (!kind) return undefined;

    const list = schema[kind];
    if (!Array.isArray(list)) return undefined;

    const members = list.flatMap((member): CompositionMember[] => {
        if (!isJsonObject(member)) return [];
        return [memberName(member) ?? member];
    });
    if (members.length === 0) return undefined;

    const discriminator = schema['discriminator'];
    return {
        kind,
        members,
        ...(isJsonObject(discriminator) ? { discriminator: extractDiscriminator(discriminator) } : {}),
    };
}

/**
 * Read a discriminator object. `propertyName` defaults to `"type"`;
 * mapping targets given as references are reduced to schema names.
 */
export function extractDiscriminator(raw: JsonObject): Discriminator {
    const rawMapping = raw['mapping'];
    const mapping = isJsonObject(rawMapping)
        ? Object.entries(rawMapping).flatMap(([value, target]): [string, string][] =>
            typeof target === 'string' ? [[value, schemaNameFromRef(target)]] : [])
        : [];

    return {
        propertyName: readString(raw, 'propertyName') ?? 'type',
        mapping: Object.fromEntries(mapping),
    };
}

/** Last pointer segment of a reference: `#/components/schemas/Pet` → `Pet` */
export function schemaNameFromRef(ref: string): string {
    const segments = ref.split('/');
    return segments[segments.length - 1] ?? ref;
}

/** Name of a pure reference or of a circular marker */
function memberName(member: JsonObject): string | undefined {
    const ref = member[REF_KEY] ?? member[CIRCULAR_REF_KEY];
    return typeof ref === 'string' ? schemaNameFromRef(ref) : undefined;
}

// ── allOf Flattening ─────────────────────────────────────

/**
 * Merge allOf members into one object schema.
 *
 * - `properties`: unioned, a later member overwrites a same-named property
 * - `required`: concatenated, then deduplicated
 * - `description` / `title`: the first member that sets one wins
 */
export function mergeAllOf(members: readonly JsonValue[]): JsonObject {
    // A Map keeps `__proto__` as an ordinary property name
    const properties = new Map<string, JsonValue>();
    const required: string[] = [];
    const metadata: JsonObject = {};

    for (const member of members) {
        if (!isJsonObject(member)) continue;

        const memberProperties = member['properties'];
        if (isJsonObject(memberProperties)) {
            for (const [name, property] of Object.entries(memberProperties)) {
                if (property !== undefined) properties.set(name, property);
            }
        }

        const memberRequired = member['required'];
        if (Array.isArray(memberRequired)) {
            for (const name of memberRequired) {
                if (typeof name === 'string') required.push(name);
            }
        }

        for (const key of ['description', 'title']) {
            const value = member[key];
            if (value !== undefined && !(key in metadata)) metadata[key] = value;
        }
    }

    return {
        type: 'object',
        properties: Object.fromEntries(properties),
        required: [...new Set(required)],
        ...metadata,
    };
}
