/**
 * Intermediate Representation Types
 *
 * Data structures shared by the resolver, the analyzers and the IR
 * builder. The raw document is an untyped JSON tree; everything past
 * resolution is described by the readonly IR types below, which code
 * generators consume without further semantic analysis.
 *
 * @module
 */

// ── JSON Tree ────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];
export interface JsonObject { [key: string]: JsonValue | undefined; }

/** Narrow an arbitrary value to a plain JSON object (not an array, not null) */
export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep check that a decoded value is made only of JSON types */
export function isJsonValue(value: unknown): value is JsonValue {
    if (value === null) return true;
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return true;
        case 'number':
            return Number.isFinite(value);
        case 'object':
            if (Array.isArray(value)) return value.every(isJsonValue);
            return Object.values(value).every(v => v === undefined || isJsonValue(v));
        default:
            return false;
    }
}

/** Read a string field, ignoring values of any other type */
export function readString(obj: JsonObject, key: string): string | undefined {
    const value = obj[key];
    return typeof value === 'string' ? value : undefined;
}

// ── References ───────────────────────────────────────────

/** Key under which a reference locator is stored */
export const REF_KEY = '$ref';

/** Key of the marker node that replaces a circular reference */
export const CIRCULAR_REF_KEY = '$circular_ref';

/** A `$ref` locator split on its first `#` */
export interface Reference {
    /** External file path or URL; empty for the current document */
    readonly document: string;
    /** RFC 6901 pointer; empty for the whole document */
    readonly pointer: string;
}

/** Marker left in place of a reference met again while still being resolved */
export interface CircularRef {
    readonly [CIRCULAR_REF_KEY]: string;
}

export function isCircularRef(value: unknown): value is CircularRef {
    return isJsonObject(value) && typeof value[CIRCULAR_REF_KEY] === 'string';
}

// ── Schema Composition ───────────────────────────────────

export type CompositionKind = 'allOf' | 'oneOf' | 'anyOf';

/** Selects the concrete member of a union by a property value */
export interface Discriminator {
    readonly propertyName: string;
    /** Discriminator value → bare schema name */
    readonly mapping: Readonly<Record<string, string>>;
}

/**
 * Either the bare name of a referenced schema, or an inline schema that
 * needs a synthesized name downstream.
 */
export type CompositionMember = string | JsonObject;

export interface Composition {
    readonly kind: CompositionKind;
    readonly members: readonly CompositionMember[];
    readonly discriminator?: Discriminator;
}

/** A named entry of `components.schemas` */
export interface SchemaType {
    readonly name: string;
    readonly schema: JsonValue;
    readonly composition?: Composition;
    /** allOf compositions flattened into a single object schema */
    readonly merged?: JsonObject;
}

// ── Operations & Resources ───────────────────────────────

/** Which rule produced an operation name */
export type NameTier = 'declared-id' | 'rpc-action' | 'method-shape' | 'fallback';

export interface InferredName {
    readonly name: string;
    readonly tier: NameTier;
}

/** A single API operation, identified by `METHOD path` */
export interface Operation {
    readonly path: string;
    /** Upper-case HTTP method */
    readonly method: string;
    readonly operationId?: string;
    readonly summary?: string;
    readonly description?: string;
    readonly deprecated: boolean;
    readonly tags: readonly string[];
    readonly parameters: readonly JsonObject[];
    readonly requestBody?: JsonObject;
    /** Status code → response object */
    readonly responses: Readonly<Record<string, JsonValue>>;
    /** `x-*` vendor extension fields */
    readonly extensions: Readonly<Record<string, JsonValue>>;
    /** Inferred name, as found in the spec */
    readonly name: string;
    readonly nameTier: NameTier;
    /** `name` as a legal snake_case method identifier */
    readonly identifier: string;
}

/** An operation found under one tag while grouping */
export interface GroupedOperation {
    readonly path: string;
    readonly method: string;
    readonly operation: JsonObject;
}

export interface Resource {
    /** Tag or path segment, as found in the spec */
    readonly name: string;
    /** Snake_case accessor of the resource on a client */
    readonly identifier: string;
    readonly className: string;
    readonly pathPrefix?: string;
    readonly requiresId: boolean;
    readonly idParamName?: string;
    readonly description?: string;
    /** Shared with every other resource the operation is tagged into */
    readonly operations: readonly Operation[];
    /** Operation key → method identifier, deduplicated within this resource */
    readonly methodNames: Readonly<Record<string, string>>;
    readonly nestedGroups: Readonly<Record<string, readonly Operation[]>>;
    /** Nested group name → accessor identifier on the parent resource */
    readonly nestedAccessors: Readonly<Record<string, string>>;
}

export type NamespaceSource = 'path' | 'server';

export interface Namespace {
    readonly name: string;
    readonly pathPrefix: string;
    readonly source: NamespaceSource;
    readonly resources: readonly Resource[];
}

// ── Naming Conventions ───────────────────────────────────

export type NamingConvention = 'snake_case' | 'camelCase' | 'PascalCase' | 'SCREAMING_SNAKE_CASE' | 'unknown';

export type FieldNaming = 'snake_case' | 'camelCase' | 'original';

export interface NamingConventions {
    readonly request: FieldNaming;
    readonly response: FieldNaming;
    readonly parameter: FieldNaming;
}

// ── Diagnostics ──────────────────────────────────────────

export type DiagnosticCode = 'method-fallback' | 'default-resource' | 'duplicate-name';

/** Non-fatal finding: a heuristic fell back to a generic default */
export interface Diagnostic {
    readonly severity: 'warning';
    readonly code: DiagnosticCode;
    readonly message: string;
    /** What the diagnostic is about, e.g. an operation key or a path */
    readonly subject: string;
}

// ── IR (top-level) ───────────────────────────────────────

export interface ApiServer {
    readonly url: string;
    readonly description?: string;
}

export interface ApiIR {
    readonly title: string;
    readonly version: string;
    readonly description?: string;
    readonly baseUrl: string;
    readonly servers: readonly ApiServer[];
    readonly namespaces: readonly Namespace[];
    readonly resources: readonly Resource[];
    readonly schemas: readonly SchemaType[];
    readonly conventions: NamingConventions;
    readonly diagnostics: readonly Diagnostic[];
}
