/**
 * NestedDetector — Sub-Resource Detection
 *
 * Finds operations of a resource that belong to a nested sub-resource,
 * e.g. `stages_instruct_create` under `stages`. An explicit extension
 * field (`x-nested-resource` by default) always wins over the
 * operationId heuristic.
 *
 * @module
 */
import { sanitizePropertyName } from '../naming/NameSanitizer.js';
import { readString, type GroupedOperation, type JsonObject } from '../parser/types.js';

export interface NestedOptions {
    /** Extension field naming the nested resource (default: `x-nested-resource`) */
    readonly extensionKey?: string;
    /** Smallest group kept as a nested resource (default: 2) */
    readonly minOperations?: number;
}

export const DEFAULT_NESTED_EXTENSION = 'x-nested-resource';
export const DEFAULT_MIN_NESTED_OPERATIONS = 2;

/** Leading operationId parts that mark a plain action, not a resource */
const ACTION_VERBS: ReadonlySet<string> = new Set([
    'get', 'list', 'create', 'update', 'delete', 'patch', 'post', 'put',
    'upload', 'download', 'fetch', 'search', 'find',
]);

/**
 * Group the operations of one resource by nested resource name, in
 * encounter order. Operations with no nested name are left out.
 */
export function detectNestedResources(
    operations: readonly GroupedOperation[],
    options: NestedOptions = {},
): Map<string, GroupedOperation[]> {
    const extensionKey = options.extensionKey ?? DEFAULT_NESTED_EXTENSION;
    const nested = new Map<string, GroupedOperation[]>();

    for (const entry of operations) {
        const name = readExtension(entry.operation, extensionKey)
            ?? extractNestedFromOperationId(readString(entry.operation, 'operationId') ?? '');
        if (!name) continue;

        const group = nested.get(name) ?? [];
        group.push(entry);
        nested.set(name, group);
    }

    return nested;
}

/**
 * Nested name declared by the extension field. Numbers and booleans are
 * taken as their string form; other values do not declare a name.
 */
function readExtension(operation: JsonObject, key: string): string | undefined {
    const value = operation[key];
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Second `_`-separated part of an operationId shaped `resource_nested_action`.
 *
 * @example
 * extractNestedFromOperationId('stages_instruct_create')        → 'instruct'
 * extractNestedFromOperationId('get_user_profile')              → undefined
 * extractNestedFromOperationId('list_items_api_v1_items_get')   → undefined
 */
export function extractNestedFromOperationId(operationId: string): string | undefined {
    if (!operationId) return undefined;

    const parts = operationId.split('_');
    // framework-generated ids such as `read_item_api_v1_items_get`
    if (parts.length > 5 && parts.includes('api')) return undefined;
    if (ACTION_VERBS.has((parts[0] ?? '').toLowerCase())) return undefined;

    return parts.length >= 3 ? parts[1] : undefined;
}

/** Groups below the threshold are folded back into the parent resource */
export function shouldCreateNestedResource(
    operationCount: number,
    minOperations: number = DEFAULT_MIN_NESTED_OPERATIONS,
): boolean {
    return operationCount >= minOperations;
}

/**
 * Accessor name of a nested resource on its parent.
 *
 * @example
 * getNestedPropertyName('Instruct')   → 'instruct'
 * getNestedPropertyName('user-notes') → 'user_notes'
 */
export function getNestedPropertyName(nestedName: string): string {
    return sanitizePropertyName(nestedName.toLowerCase(), 'nested');
}
