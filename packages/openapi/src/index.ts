/**
 * @sdkgen-ir/openapi — Root Barrel Export
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```typescript
 * import { parseSpec, buildIR, mergeConfig } from '@sdkgen-ir/openapi';
 *
 * const parsed = await parseSpec('./petstore.yaml');
 * const ir = buildIR(parsed, mergeConfig({ excludeTags: ['internal'] }));
 * ```
 *
 * @module
 */

// ── Config ───────────────────────────────────────────────
export { mergeConfig, DEFAULT_CONFIG } from './config/AnalyzerConfig.js';
export type { AnalyzerConfig, NamingConfig, ResolverConfig, PartialConfig } from './config/AnalyzerConfig.js';
export { loadConfig, applyCliOverrides, CONFIG_FILENAMES } from './config/ConfigLoader.js';
export type { CliOverrides } from './config/ConfigLoader.js';

// ── Errors ───────────────────────────────────────────────
export {
    AnalysisError, StructuralError, RefResolutionError,
    DocumentNotFoundError, FetchError, ConfigError,
} from './errors.js';
export type { AnalysisErrorCode } from './errors.js';

// ── Observability ────────────────────────────────────────
export { createDebugObserver } from './observability/DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn, ResolveEvent, FetchEvent,
    DiagnosticEvent, StageEvent, PipelineStage,
} from './observability/DebugObserver.js';

// ── Parser ───────────────────────────────────────────────
export {
    parseSpec, parseSpecDocument, validateSpec,
    extractMetadata, extractServers, getBaseUrl,
} from './parser/OpenApiParser.js';
export type { ParseOptions, ParsedSpec, SpecMetadata } from './parser/OpenApiParser.js';
export { resolveRefs, extractAllReferences } from './parser/RefResolver.js';
export type { DocumentLoader, ResolveOptions } from './parser/RefResolver.js';
export {
    parseReference, parsePointer, formatPointer,
    escapeSegment, unescapeSegment, resolvePointer,
} from './parser/JsonPointer.js';
export { createDocumentLoader, loadDocument, decodeDocument, getBaseDir, isUrl } from './parser/DocumentLoader.js';
export type { LoaderOptions } from './parser/DocumentLoader.js';
export { HttpCache, DEFAULT_CACHE_DIR } from './parser/HttpCache.js';
export type { HttpCacheOptions, FetchOptions } from './parser/HttpCache.js';
export { isJsonObject, isCircularRef, CIRCULAR_REF_KEY, REF_KEY } from './parser/types.js';
export type {
    JsonValue, JsonObject, JsonPrimitive, Reference, CircularRef,
    CompositionKind, Composition, CompositionMember, Discriminator, SchemaType,
    NameTier, InferredName, Operation, GroupedOperation, Resource,
    Namespace, NamespaceSource, NamingConvention, FieldNaming, NamingConventions,
    Diagnostic, DiagnosticCode, ApiServer, ApiIR,
} from './parser/types.js';

// ── Schema Composition ───────────────────────────────────
export {
    analyzeComposition, mergeAllOf, isComposition,
    getCompositionKind, extractDiscriminator, schemaNameFromRef,
} from './schema/SchemaAnalyzer.js';

// ── Endpoints, Namespaces, Nested Resources ──────────────
export {
    groupByTags, extractResourceFromPath, detectPathPrefix, requiresResourceId,
    responseIsArray, cleanOperationId, inferOperationName, operationKey,
    toOperation, buildResources, HTTP_METHODS,
} from './mapper/EndpointAnalyzer.js';
export type { ResourceOptions } from './mapper/EndpointAnalyzer.js';
export {
    detectNamespaces, extractNamespaceFromPath, extractNamespaceFromUrl,
    groupPathsByNamespace, assignResources,
} from './mapper/NamespaceAnalyzer.js';
export {
    detectNestedResources, extractNestedFromOperationId,
    shouldCreateNestedResource, getNestedPropertyName,
} from './mapper/NestedDetector.js';
export type { NestedOptions } from './mapper/NestedDetector.js';

// ── Naming ───────────────────────────────────────────────
export { toSnakeCase, toCamelCase, toPascalCase, detectNamingConvention } from './naming/CaseConverter.js';
export {
    sanitizeIdentifier, sanitizeClassName, sanitizeEnumMemberName,
    sanitizePackageName, sanitizePropertyName, isReservedWord,
} from './naming/NameSanitizer.js';
export { detectFieldNaming, detectParameterNaming, analyzeNamingConventions } from './naming/NamingAnalyzer.js';

// ── Pipeline ─────────────────────────────────────────────
export { analyzeSpec, buildIR, buildSchemaTypes } from './pipeline/buildIR.js';
export type { AnalyzeOptions } from './pipeline/buildIR.js';
