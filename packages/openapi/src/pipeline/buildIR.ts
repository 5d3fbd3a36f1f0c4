/**
 * buildIR — Resolved Spec → API Intermediate Representation
 *
 * Runs every analyzer over a parsed spec and assembles the {@link ApiIR}
 * a code generator consumes. {@link analyzeSpec} drives the whole
 * pipeline from a file path or URL.
 *
 * @example
 * ```typescript
 * import { analyzeSpec } from '@sdkgen-ir/openapi';
 *
 * const ir = await analyzeSpec('./petstore.yaml', {
 *     config: { includeTags: ['pets'] },
 * });
 * console.log(ir.resources.map(r => r.name)); // ['pets']
 * ```
 *
 * @module
 */
import { DEFAULT_CONFIG, mergeConfig, type AnalyzerConfig, type PartialConfig } from '../config/AnalyzerConfig.js';
import { buildResources } from '../mapper/EndpointAnalyzer.js';
import { assignResources, detectNamespaces } from '../mapper/NamespaceAnalyzer.js';
import { analyzeNamingConventions } from '../naming/NamingAnalyzer.js';
import { createDebugObserver, traceStage, type DebugObserverFn } from '../observability/DebugObserver.js';
import { HttpCache } from '../parser/HttpCache.js';
import { extractMetadata, getBaseUrl, parseSpec, type ParsedSpec } from '../parser/OpenApiParser.js';
import type { DocumentLoader } from '../parser/RefResolver.js';
import {
    isJsonObject,
    type ApiIR, type Composition, type Diagnostic, type JsonObject, type SchemaType,
} from '../parser/types.js';
import { analyzeComposition, mergeAllOf } from '../schema/SchemaAnalyzer.js';

// ── Types ────────────────────────────────────────────────

export interface AnalyzeOptions {
    /** Full config, or a partial one merged with the defaults */
    readonly config?: AnalyzerConfig | PartialConfig;
    /** Event observer; defaults to console output when `config.debug` is set */
    readonly debug?: DebugObserverFn;
    /** Working directory for relative sources */
    readonly cwd?: string;
    /** Custom fetch function for remote documents */
    readonly fetchFn?: typeof fetch;
    /** Replaces the default file / URL loader for external references */
    readonly loader?: DocumentLoader;
}

// ── Pipeline ─────────────────────────────────────────────

/**
 * Load, validate and resolve a spec, then build its IR.
 *
 * @throws {StructuralError} For documents that are not OpenAPI 3.x
 * @throws {RefResolutionError} For references that cannot be resolved
 */
export async function analyzeSpec(source: string, options: AnalyzeOptions = {}): Promise<ApiIR> {
    const config = mergeConfig(options.config ?? {});
    const debug = options.debug ?? (config.debug ? createDebugObserver() : undefined);

    const httpCache = new HttpCache({
        timeoutMs: config.resolver.timeoutMs,
        ...(config.resolver.cacheDir !== undefined ? { cacheDir: config.resolver.cacheDir } : {}),
        ...(options.fetchFn ? { fetchFn: options.fetchFn } : {}),
        ...(debug ? { debug } : {}),
    });

    const parsed = await parseSpec(source, {
        httpCache,
        ...(config.resolver.useCache ? {} : { refresh: true }),
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
        ...(options.loader ? { loader: options.loader } : {}),
        ...(debug ? { debug } : {}),
    });

    return traceStage(
        debug,
        'analyze',
        () => buildIR(parsed, config, debug),
        ir => `${ir.resources.length} resources`,
    );
}

/**
 * Build the IR of an already parsed spec. Naming findings are collected
 * into `diagnostics` and sent to the observer.
 */
export function buildIR(
    parsed: ParsedSpec,
    config: AnalyzerConfig = DEFAULT_CONFIG,
    debug?: DebugObserverFn,
): ApiIR {
    const spec = parsed.resolved;
    const metadata = extractMetadata(spec);

    const diagnostics: Diagnostic[] = [];
    const onDiagnostic = (diagnostic: Diagnostic): void => {
        diagnostics.push(diagnostic);
        debug?.({ type: 'diagnostic', diagnostic, timestamp: Date.now() });
    };

    const resources = buildResources(spec, {
        deduplicate: config.naming.deduplication,
        includeTags: config.includeTags,
        excludeTags: config.excludeTags,
        nested: {
            extensionKey: config.naming.nestedExtension,
            minOperations: config.naming.minNestedOperations,
        },
        onDiagnostic,
    });

    return {
        title: metadata.title,
        version: metadata.version,
        ...(metadata.description ? { description: metadata.description } : {}),
        baseUrl: getBaseUrl(spec),
        servers: metadata.servers,
        namespaces: assignResources(detectNamespaces(spec), resources),
        resources,
        schemas: buildSchemaTypes(parsed.raw, spec),
        conventions: analyzeNamingConventions(spec),
        diagnostics,
    };
}

// ── Schemas ──────────────────────────────────────────────

/**
 * One entry per `components.schemas` key. Compositions are read from
 * the raw document, where member references still carry schema names;
 * inline members and merged allOf schemas come from the resolved one.
 */
export function buildSchemaTypes(raw: JsonObject, resolved: JsonObject): SchemaType[] {
    const rawSchemas = componentSchemas(raw);
    const resolvedSchemas = componentSchemas(resolved);

    return Object.entries(resolvedSchemas).flatMap(([name, schema]): SchemaType[] => {
        if (schema === undefined) return [];

        const rawSchema = rawSchemas[name];
        const source = isJsonObject(rawSchema) && analyzeComposition(rawSchema) ? rawSchema : schema;
        const composition = isJsonObject(source) ? analyzeComposition(source) : undefined;
        if (!composition || !isJsonObject(schema)) return [{ name, schema }];

        const resolvedMembers = schema[composition.kind];
        const members = Array.isArray(resolvedMembers) ? resolvedMembers : [];

        return [{
            name,
            schema,
            composition: withResolvedInlineMembers(composition, members.filter(isJsonObject)),
            ...(composition.kind === 'allOf' ? { merged: mergeAllOf(members) } : {}),
        }];
    });
}

function componentSchemas(spec: JsonObject): JsonObject {
    const components = spec['components'];
    const schemas = isJsonObject(components) ? components['schemas'] : undefined;
    return isJsonObject(schemas) ? schemas : {};
}

/** Replace inline members with their resolved counterpart at the same position */
function withResolvedInlineMembers(composition: Composition, resolved: readonly JsonObject[]): Composition {
    return {
        ...composition,
        members: composition.members.map((member, index) =>
            typeof member === 'string' ? member : resolved[index] ?? member),
    };
}
