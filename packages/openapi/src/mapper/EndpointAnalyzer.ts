/**
 * EndpointAnalyzer — Operations → Named Resources
 *
 * Groups the operations of a resolved spec into resources (one per tag,
 * or per leading path segment for untagged operations) and names every
 * operation with a three-tier cascade:
 *
 *   1. declared-id:  the cleaned operationId is a plain CRUD / file verb
 *   2. rpc-action:   the last static path segment is an action word
 *   3. method-shape: HTTP method plus response shape
 *
 * Method names are deduplicated per resource (`get`, `get_2`, ...).
 *
 * @module
 */
import {
    isJsonObject, readString,
    type Diagnostic, type GroupedOperation, type InferredName, type JsonObject,
    type JsonValue, type Operation, type Resource,
} from '../parser/types.js';
import { toSnakeCase } from '../naming/CaseConverter.js';
import { sanitizeClassName, sanitizePropertyName } from '../naming/NameSanitizer.js';
import {
    detectNestedResources, getNestedPropertyName, shouldCreateNestedResource,
    type NestedOptions,
} from './NestedDetector.js';

// ── Vocabularies ─────────────────────────────────────────

/** Methods read from each path item, in this order */
export const HTTP_METHODS = ['get', 'post', 'put', 'patch', 'delete', 'head', 'options'] as const;

/** Segments that never name a resource */
const NON_RESOURCE_SEGMENTS: ReadonlySet<string> = new Set(['api', 'beta', 'alpha']);

/** operationIds used as-is once cleaned */
const DECLARED_VERBS: ReadonlySet<string> = new Set([
    'create', 'list', 'get', 'update', 'delete',
    'download', 'upload', 'export', 'import',
]);

/** Trailing path segments naming an RPC-style action */
const ACTION_WORDS: ReadonlySet<string> = new Set([
    // files
    'download', 'upload', 'export', 'import',
    // state
    'activate', 'deactivate', 'enable', 'disable',
    'publish', 'unpublish', 'archive', 'unarchive',
    // workflow
    'approve', 'reject', 'cancel', 'complete', 'submit', 'confirm', 'verify', 'validate',
    // execution
    'execute', 'trigger', 'run', 'start', 'stop', 'pause', 'resume', 'retry', 'restart',
    // data
    'refresh', 'sync', 'clone', 'duplicate', 'copy', 'resend', 'reprocess',
    // utility
    'summary', 'status', 'health', 'me', 'current',
]);

const OPERATION_ID_SUFFIX_TOKENS: ReadonlySet<string> = new Set(['v1', 'v2', 'beta']);

const DEFAULT_RESOURCE = 'default';

// ── Path Helpers ─────────────────────────────────────────

function splitPath(path: string): string[] {
    return path.replace(/^\/+|\/+$/g, '').split('/');
}

function isPathParam(segment: string): boolean {
    return segment.startsWith('{');
}

function isVersionToken(segment: string): boolean {
    return /^v\d+$/.test(segment);
}

/** Path segments that are not `{parameters}` */
function staticSegments(path: string): string[] {
    return splitPath(path).filter(segment => segment.length > 0 && !isPathParam(segment));
}

// ── Grouping ─────────────────────────────────────────────

/**
 * Group every operation under its tags. Untagged operations are grouped
 * under {@link extractResourceFromPath}; an operation with several tags
 * appears in each group.
 */
export function groupByTags(spec: JsonObject): Map<string, GroupedOperation[]> {
    const grouped = new Map<string, GroupedOperation[]>();
    const paths = spec['paths'];
    if (!isJsonObject(paths)) return grouped;

    for (const [path, pathItem] of Object.entries(paths)) {
        if (!isJsonObject(pathItem)) continue;

        for (const method of HTTP_METHODS) {
            const operation = pathItem[method];
            if (!isJsonObject(operation)) continue;

            const declared = readTags(operation);
            const tags = declared.length > 0 ? declared : [extractResourceFromPath(path)];
            for (const tag of tags) {
                const group = grouped.get(tag) ?? [];
                group.push({ path, method: method.toUpperCase(), operation });
                grouped.set(tag, group);
            }
        }
    }

    return grouped;
}

/**
 * First path segment that is not a parameter, a version token or an
 * `api` / `beta` / `alpha` keyword.
 *
 * @example
 * extractResourceFromPath('/api/v1/products')        → 'products'
 * extractResourceFromPath('/v2/orders/{id}/items')   → 'orders'
 * extractResourceFromPath('/{id}')                   → 'default'
 */
export function extractResourceFromPath(path: string): string {
    const name = splitPath(path).find(segment =>
        segment.length > 0
        && !isPathParam(segment)
        && !isVersionToken(segment)
        && !NON_RESOURCE_SEGMENTS.has(segment),
    );
    return name ?? DEFAULT_RESOURCE;
}

/**
 * Common path prefix of a resource's paths.
 *
 * A single path yields its first two static segments. Several paths
 * yield the first static segment when every path agrees on it.
 *
 * @example
 * detectPathPrefix(['/api/users/{id}'])           → '/api/users'
 * detectPathPrefix(['/users', '/users/{id}'])     → '/users'
 * detectPathPrefix(['/users', '/products'])       → undefined
 */
export function detectPathPrefix(paths: readonly string[]): string | undefined {
    if (paths.length === 0) return undefined;

    if (paths.length === 1) {
        const segments = staticSegments(paths[0] ?? '');
        return segments.length > 0 ? `/${segments.slice(0, 2).join('/')}` : undefined;
    }

    let common: string | undefined;
    for (const path of paths) {
        const first = staticSegments(path)[0];
        if (first === undefined) continue;

        const prefix = `/${first}`;
        if (common === undefined) {
            common = prefix;
        } else if (!common.startsWith(prefix) && !prefix.startsWith(common)) {
            return undefined;
        }
    }
    return common;
}

/**
 * A resource takes an id when its paths use exactly one distinct
 * parameter whose name contains "id".
 */
export function requiresResourceId(paths: readonly string[]): { requiresId: boolean; paramName?: string } {
    const idParams = new Set<string>();
    for (const path of paths) {
        for (const segment of splitPath(path)) {
            if (!segment.startsWith('{') || !segment.endsWith('}')) continue;
            const param = segment.slice(1, -1);
            if (param.toLowerCase().includes('id')) idParams.add(param);
        }
    }

    const [paramName] = idParams;
    return idParams.size === 1 && paramName !== undefined
        ? { requiresId: true, paramName }
        : { requiresId: false };
}

// ── Naming Cascade ───────────────────────────────────────

/**
 * Whether the primary response is a JSON array. `200` is checked before
 * `201`; the first of them that declares a JSON schema decides.
 */
export function responseIsArray(responses: JsonObject): boolean {
    for (const status of ['200', '201']) {
        const response = responses[status];
        if (!isJsonObject(response)) continue;

        const content = response['content'];
        const media = isJsonObject(content) ? content['application/json'] : undefined;
        const schema = isJsonObject(media) ? media['schema'] : undefined;
        if (isJsonObject(schema)) return schema['type'] === 'array';
    }
    return false;
}

/**
 * Strip a framework-generated `_api_...` suffix, then a trailing
 * `v1` / `v2` / `beta` token.
 *
 * @example
 * cleanOperationId('create_user_api_v1_users_post') → 'create_user'
 * cleanOperationId('list_beta_api_items')           → 'list'
 * cleanOperationId('getPet')                        → 'getPet'
 */
export function cleanOperationId(operationId: string): string {
    const index = operationId.indexOf('_api_');
    if (index < 0) return operationId;

    const parts = operationId.slice(0, index).split('_');
    const last = parts[parts.length - 1];
    if (last !== undefined && OPERATION_ID_SUFFIX_TOKENS.has(last)) parts.pop();
    return parts.join('_');
}

interface NamingInput {
    readonly method: string;
    readonly path: string;
    readonly operationId: string | undefined;
    readonly responses: JsonObject;
}

type NameTierFn = (input: NamingInput) => InferredName | undefined;

function fromDeclaredId({ operationId }: NamingInput): InferredName | undefined {
    if (!operationId) return undefined;
    const cleaned = cleanOperationId(operationId);
    return DECLARED_VERBS.has(cleaned) ? { name: cleaned, tier: 'declared-id' } : undefined;
}

function fromRpcAction({ path }: NamingInput): InferredName | undefined {
    const segments = staticSegments(path);
    const last = segments[segments.length - 1];
    if (segments.length <= 1 || last === undefined || !ACTION_WORDS.has(last)) return undefined;
    return { name: last.toLowerCase(), tier: 'rpc-action' };
}

function fromMethodShape({ method, path, responses }: NamingInput): InferredName {
    switch (method) {
        case 'GET': {
            if (path.includes('{')) return { name: 'get', tier: 'method-shape' };
            if (responseIsArray(responses)) return { name: 'list', tier: 'method-shape' };
            const segments = staticSegments(path);
            const last = segments[segments.length - 1];
            return { name: last !== undefined ? last.toLowerCase() : 'get', tier: 'method-shape' };
        }
        case 'POST':
            return { name: 'create', tier: 'method-shape' };
        case 'PUT':
        case 'PATCH':
            return { name: 'update', tier: 'method-shape' };
        case 'DELETE':
            return { name: 'delete', tier: 'method-shape' };
        default:
            return { name: method.toLowerCase(), tier: 'fallback' };
    }
}

/** Tried in order; when none yields a name, the method-shape rule decides */
const NAME_TIERS: readonly NameTierFn[] = [fromDeclaredId, fromRpcAction];

/**
 * Infer the method name of an operation.
 *
 * @example
 * inferOperationName('POST', '/users', 'create', {})               → { name: 'create', tier: 'declared-id' }
 * inferOperationName('GET', '/files/{id}/download', undefined, {}) → { name: 'download', tier: 'rpc-action' }
 * inferOperationName('GET', '/users/{id}', undefined, {})          → { name: 'get', tier: 'method-shape' }
 */
export function inferOperationName(
    method: string,
    path: string,
    operationId: string | undefined,
    responses: JsonObject,
): InferredName {
    const input: NamingInput = { method: method.toUpperCase(), path, operationId, responses };
    for (const tier of NAME_TIERS) {
        const inferred = tier(input);
        if (inferred) return inferred;
    }
    return fromMethodShape(input);
}

// ── Operations ───────────────────────────────────────────

/** Identity of an operation within a spec: `METHOD path` */
export function operationKey(operation: { readonly method: string; readonly path: string }): string {
    return `${operation.method.toUpperCase()} ${operation.path}`;
}

/** Build the IR operation of a grouped entry, with its inferred name */
export function toOperation({ path, method, operation }: GroupedOperation): Operation {
    const upper = method.toUpperCase();
    const operationId = readString(operation, 'operationId');
    const summary = readString(operation, 'summary');
    const description = readString(operation, 'description');
    const requestBody = operation['requestBody'];

    const rawResponses = operation['responses'];
    const responses = Object.fromEntries(
        isJsonObject(rawResponses) ? definedEntries(rawResponses) : [],
    );

    const rawParameters = operation['parameters'];
    const parameters = Array.isArray(rawParameters) ? rawParameters.filter(isJsonObject) : [];

    const extensions = Object.fromEntries(
        definedEntries(operation).filter(([key]) => key.startsWith('x-')),
    );

    const inferred = inferOperationName(upper, path, operationId, responses);

    return {
        path,
        method: upper,
        ...(operationId ? { operationId } : {}),
        ...(summary ? { summary } : {}),
        ...(description ? { description } : {}),
        deprecated: operation['deprecated'] === true,
        tags: readTags(operation),
        parameters,
        ...(isJsonObject(requestBody) ? { requestBody } : {}),
        responses,
        extensions,
        name: inferred.name,
        nameTier: inferred.tier,
        identifier: toMethodIdentifier(inferred.name),
    };
}

// ── Resources ────────────────────────────────────────────

export interface ResourceOptions {
    /** Rename colliding method names inside one resource (default: true) */
    readonly deduplicate?: boolean;
    /** Keep only these tags (default: every tag) */
    readonly includeTags?: readonly string[];
    /** Drop these tags */
    readonly excludeTags?: readonly string[];
    readonly nested?: NestedOptions;
    /** Receives every non-fatal naming finding */
    readonly onDiagnostic?: (diagnostic: Diagnostic) => void;
}

/**
 * Build the resources of a resolved spec, in tag encounter order.
 * Operations tagged into several resources are shared between them.
 */
export function buildResources(spec: JsonObject, options: ResourceOptions = {}): Resource[] {
    const report = options.onDiagnostic ?? (() => undefined);
    const include = new Set(options.includeTags ?? []);
    const exclude = new Set(options.excludeTags ?? []);
    const tagDescriptions = readTagDescriptions(spec);
    const minOperations = options.nested?.minOperations;

    const operations = new Map<string, Operation>();
    const operationFor = (grouped: GroupedOperation): Operation => {
        const key = operationKey(grouped);
        const cached = operations.get(key);
        if (cached) return cached;

        const operation = toOperation(grouped);
        operations.set(key, operation);
        if (operation.nameTier === 'fallback') {
            report({
                severity: 'warning',
                code: 'method-fallback',
                message: `No naming rule matched; using the method name "${operation.name}"`,
                subject: key,
            });
        }
        return operation;
    };

    const resources: Resource[] = [];
    for (const [name, group] of groupByTags(spec)) {
        if (include.size > 0 && !include.has(name)) continue;
        if (exclude.has(name)) continue;

        if (name === DEFAULT_RESOURCE) {
            for (const { path } of group) {
                report({
                    severity: 'warning',
                    code: 'default-resource',
                    message: `No resource name found in path; grouped under "${DEFAULT_RESOURCE}"`,
                    subject: path,
                });
            }
        }

        const resourceOperations = group.map(operationFor);
        const methodNames: [string, string][] = [];
        const used = new Set<string>();
        for (const operation of resourceOperations) {
            const key = operationKey(operation);
            let methodName = operation.identifier;
            if (options.deduplicate !== false && used.has(methodName)) {
                methodName = deduplicate(methodName, used);
                report({
                    severity: 'warning',
                    code: 'duplicate-name',
                    message: `"${operation.identifier}" renamed to "${methodName}" in resource "${name}"`,
                    subject: key,
                });
            }
            used.add(methodName);
            methodNames.push([key, methodName]);
        }

        const nestedGroups = [...detectNestedResources(group, options.nested)]
            .filter(([, nested]) => shouldCreateNestedResource(nested.length, minOperations))
            .map(([nestedName, nested]): [string, Operation[]] => [nestedName, nested.map(operationFor)]);

        const paths = [...new Set(group.map(entry => entry.path))];
        const pathPrefix = detectPathPrefix(paths);
        const { requiresId, paramName } = requiresResourceId(paths);
        const description = tagDescriptions.get(name);

        resources.push({
            name,
            identifier: sanitizePropertyName(toSnakeCase(name), 'resource'),
            className: sanitizeClassName(name),
            ...(pathPrefix ? { pathPrefix } : {}),
            requiresId,
            ...(paramName ? { idParamName: paramName } : {}),
            ...(description ? { description } : {}),
            operations: resourceOperations,
            methodNames: Object.fromEntries(methodNames),
            nestedGroups: Object.fromEntries(nestedGroups),
            nestedAccessors: Object.fromEntries(
                nestedGroups.map(([nestedName]): [string, string] => [nestedName, getNestedPropertyName(nestedName)]),
            ),
        });
    }

    return resources;
}

// ── Helpers ──────────────────────────────────────────────

function readTags(operation: JsonObject): string[] {
    const tags = operation['tags'];
    if (!Array.isArray(tags)) return [];
    return tags.filter((tag): tag is string => typeof tag === 'string' && tag.length > 0);
}

/** Tag name → description from the top-level `tags` list */
function readTagDescriptions(spec: JsonObject): Map<string, string> {
    const descriptions = new Map<string, string>();
    const tags = spec['tags'];
    if (!Array.isArray(tags)) return descriptions;

    for (const tag of tags) {
        if (!isJsonObject(tag)) continue;
        const name = readString(tag, 'name');
        const description = readString(tag, 'description');
        if (name && description) descriptions.set(name, description);
    }
    return descriptions;
}

/**
 * Own entries with a value. Objects built from them with
 * `Object.fromEntries` keep keys such as `__proto__` as data properties.
 */
function definedEntries(object: JsonObject): [string, JsonValue][] {
    return Object.entries(object).flatMap(([key, value]): [string, JsonValue][] =>
        value === undefined ? [] : [[key, value]]);
}

/**
 * @example
 * toMethodIdentifier('user-profile') → 'user_profile'
 * toMethodIdentifier('2024')         → 'n2024'
 */
function toMethodIdentifier(name: string): string {
    return sanitizePropertyName(toSnakeCase(name), 'call');
}

/** Deduplicate by appending suffix */
function deduplicate(name: string, used: ReadonlySet<string>): string {
    let i = 2;
    while (used.has(`${name}_${i}`)) i++;
    return `${name}_${i}`;
}
