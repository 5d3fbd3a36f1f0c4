/**
 * NamespaceAnalyzer — Version and Release-Stage Detection
 *
 * Detects API namespaces (`v1`, `v2`, `beta`, ...) from path segments,
 * falling back to the first server URL when no path carries one.
 *
 * @module
 */
import { isJsonObject, readString, type JsonObject, type Namespace, type Resource } from '../parser/types.js';

const STAGE_TOKENS: ReadonlySet<string> = new Set(['beta', 'alpha', 'canary', 'preview']);

const DEFAULT_NAMESPACE = 'default';

interface NamespaceMatch {
    readonly name: string;
    /** Path up to and including the namespace token */
    readonly pathPrefix: string;
}

function isVersionToken(segment: string): boolean {
    return /^v\d+$/.test(segment);
}

function matchNamespace(path: string): NamespaceMatch | undefined {
    const parts = path.replace(/^\/+|\/+$/g, '').split('/');

    for (const [i, part] of parts.entries()) {
        if (isVersionToken(part) || STAGE_TOKENS.has(part)) {
            return { name: part, pathPrefix: `/${parts.slice(0, i + 1).join('/')}` };
        }
        const next = parts[i + 1];
        if (part === 'api' && next !== undefined && isVersionToken(next)) {
            return { name: next, pathPrefix: `/${parts.slice(0, i + 2).join('/')}` };
        }
    }
    return undefined;
}

/** Match on the path of a URL, after its scheme and host */
function matchUrlNamespace(url: string): NamespaceMatch | undefined {
    const schemeIndex = url.indexOf('://');
    const rest = schemeIndex >= 0 ? url.slice(schemeIndex + 3) : url;
    const slash = rest.indexOf('/');
    return slash >= 0 ? matchNamespace(rest.slice(slash)) : undefined;
}

// ── Public API ───────────────────────────────────────────

/**
 * Namespace token of a path.
 *
 * @example
 * extractNamespaceFromPath('/v1/users')        → 'v1'
 * extractNamespaceFromPath('/api/v2/products') → 'v2'
 * extractNamespaceFromPath('/beta/features')   → 'beta'
 * extractNamespaceFromPath('/users')           → undefined
 */
export function extractNamespaceFromPath(path: string): string | undefined {
    return matchNamespace(path)?.name;
}

/**
 * Namespace token of a server URL's path.
 *
 * @example
 * extractNamespaceFromUrl('https://api.example.com/v1') → 'v1'
 * extractNamespaceFromUrl('https://api.example.com')    → undefined
 */
export function extractNamespaceFromUrl(url: string): string | undefined {
    return matchUrlNamespace(url)?.name;
}

/**
 * One namespace per distinct token found in the paths, in first-seen
 * order. When no path has one, the first server URL is tried.
 */
export function detectNamespaces(spec: JsonObject): Namespace[] {
    const namespaces = new Map<string, Namespace>();
    const paths = spec['paths'];

    for (const path of isJsonObject(paths) ? Object.keys(paths) : []) {
        const match = matchNamespace(path);
        if (match && !namespaces.has(match.name)) {
            namespaces.set(match.name, { ...match, source: 'path', resources: [] });
        }
    }
    if (namespaces.size > 0) return [...namespaces.values()];

    // Only the first declared server counts, even when it has no usable URL
    const servers = spec['servers'];
    const first = Array.isArray(servers) ? servers[0] : undefined;
    const serverUrl = isJsonObject(first) ? readString(first, 'url') : undefined;
    const match = serverUrl !== undefined ? matchUrlNamespace(serverUrl) : undefined;
    return match ? [{ ...match, source: 'server', resources: [] }] : [];
}

/** Paths grouped by namespace token; paths without one go under `default` */
export function groupPathsByNamespace(paths: Iterable<string>): Map<string, string[]> {
    const grouped = new Map<string, string[]>();
    for (const path of paths) {
        const name = extractNamespaceFromPath(path) ?? DEFAULT_NAMESPACE;
        const group = grouped.get(name) ?? [];
        group.push(path);
        grouped.set(name, group);
    }
    return grouped;
}

/**
 * Attach resources to namespaces. A resource belongs to a path namespace
 * when one of its operation paths starts with the namespace prefix;
 * a server namespace covers every resource.
 */
export function assignResources(
    namespaces: readonly Namespace[],
    resources: readonly Resource[],
): Namespace[] {
    return namespaces.map(namespace => ({
        ...namespace,
        resources: namespace.source === 'server'
            ? [...resources]
            : resources.filter(resource =>
                resource.operations.some(operation => isUnderPrefix(operation.path, namespace.pathPrefix))),
    }));
}

function isUnderPrefix(path: string, prefix: string): boolean {
    return path === prefix || path.startsWith(`${prefix}/`);
}
