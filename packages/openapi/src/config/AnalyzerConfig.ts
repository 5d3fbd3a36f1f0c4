/**
 * AnalyzerConfig — Configuration for the IR Analyzer
 *
 * Controls naming heuristics, tag filtering, nested-resource detection
 * and how external documents are fetched.
 *
 * Can be loaded from a YAML file (`sdkgen.yaml`) or passed programmatically.
 *
 * @module
 */

// ── Naming Config ────────────────────────────────────────

/** Controls how method names and nested resources are derived */
export interface NamingConfig {
    /** Append _2, _3 for method-name collisions inside one resource */
    readonly deduplication: boolean;
    /** Operation extension field that names a nested resource */
    readonly nestedExtension: string;
    /** Smallest operation group kept as a nested resource */
    readonly minNestedOperations: number;
}

// ── Resolver Config ──────────────────────────────────────

/** Controls how external documents are fetched */
export interface ResolverConfig {
    /** Directory for cached remote documents (default: `~/.sdkgen/cache`) */
    readonly cacheDir?: string;
    /** Request timeout for remote documents, in milliseconds */
    readonly timeoutMs: number;
    /** Serve remote documents from the disk cache when present */
    readonly useCache: boolean;
}

// ── Full Config ──────────────────────────────────────────

/**
 * Complete analyzer configuration.
 *
 * Defaults: {@link DEFAULT_CONFIG}.
 */
export interface AnalyzerConfig {
    /** Path or URL of the OpenAPI spec (YAML or JSON) */
    readonly input?: string;
    /** File the IR is written to */
    readonly output?: string;
    readonly naming: NamingConfig;
    readonly resolver: ResolverConfig;
    /** Only build resources for these tags (empty = all) */
    readonly includeTags: readonly string[];
    /** Exclude these tags */
    readonly excludeTags: readonly string[];
    /** Print pipeline events through the debug observer */
    readonly debug: boolean;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: AnalyzerConfig = {
    naming: {
        deduplication: true,
        nestedExtension: 'x-nested-resource',
        minNestedOperations: 2,
    },
    resolver: {
        timeoutMs: 30_000,
        useCache: true,
    },
    includeTags: [],
    excludeTags: [],
    debug: false,
};

// ── Merge Helper ─────────────────────────────────────────

/** Partial config shape for merging */
export interface PartialConfig {
    readonly input?: string;
    readonly output?: string;
    readonly naming?: Partial<NamingConfig>;
    readonly resolver?: Partial<ResolverConfig>;
    readonly includeTags?: readonly string[];
    readonly excludeTags?: readonly string[];
    readonly debug?: boolean;
}

/**
 * Deep-merge a partial config with defaults.
 * Partial values override defaults at each level.
 */
export function mergeConfig(partial: PartialConfig): AnalyzerConfig {
    const naming = partial.naming ?? {};
    const resolver = partial.resolver ?? {};
    const cacheDir = resolver.cacheDir ?? DEFAULT_CONFIG.resolver.cacheDir;

    return {
        ...(partial.input !== undefined ? { input: partial.input } : {}),
        ...(partial.output !== undefined ? { output: partial.output } : {}),
        naming: {
            deduplication: naming.deduplication ?? DEFAULT_CONFIG.naming.deduplication,
            nestedExtension: naming.nestedExtension ?? DEFAULT_CONFIG.naming.nestedExtension,
            minNestedOperations: naming.minNestedOperations ?? DEFAULT_CONFIG.naming.minNestedOperations,
        },
        resolver: {
            ...(cacheDir !== undefined ? { cacheDir } : {}),
            timeoutMs: resolver.timeoutMs ?? DEFAULT_CONFIG.resolver.timeoutMs,
            useCache: resolver.useCache ?? DEFAULT_CONFIG.resolver.useCache,
        },
        includeTags: partial.includeTags ?? DEFAULT_CONFIG.includeTags,
        excludeTags: partial.excludeTags ?? DEFAULT_CONFIG.excludeTags,
        debug: partial.debug ?? DEFAULT_CONFIG.debug,
    };
}
