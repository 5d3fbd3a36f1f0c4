/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `sdkgen.yaml` from cwd or a specified path, validates the
 * structure with zod, and merges with defaults. CLI args override file
 * values.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { mergeConfig, type AnalyzerConfig, type PartialConfig } from './AnalyzerConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'sdkgen.yaml',
    'sdkgen.yml',
    'sdkgen.json',
] as const;

// ── File Shape ───────────────────────────────────────────

const ConfigFileSchema = z.object({
    input: z.string().optional(),
    output: z.string().optional(),
    naming: z.object({
        deduplication: z.boolean().optional(),
        nestedExtension: z.string().min(1).optional(),
        minNestedOperations: z.number().int().min(1).optional(),
    }).strict().optional(),
    resolver: z.object({
        cacheDir: z.string().optional(),
        timeoutMs: z.number().int().positive().optional(),
        useCache: z.boolean().optional(),
    }).strict().optional(),
    includeTags: z.array(z.string()).optional(),
    excludeTags: z.array(z.string()).optional(),
    debug: z.boolean().optional(),
}).strict();

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `sdkgen.yaml` / `sdkgen.yml` / `sdkgen.json` in `cwd`
 *   3. Fall back to all defaults
 *
 * @throws {ConfigError} When the file is missing, unreadable or malformed
 */
export function loadConfig(configPath?: string, cwd?: string): AnalyzerConfig {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new ConfigError(absPath, 'file not found');
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return mergeConfig({});
}

/** CLI arguments that can override config file values */
export interface CliOverrides {
    readonly input?: string;
    readonly output?: string;
    readonly debug?: boolean;
    readonly noCache?: boolean;
}

/**
 * Merge a loaded config with CLI argument overrides.
 *
 * CLI args take precedence over file values.
 */
export function applyCliOverrides(config: AnalyzerConfig, cli: CliOverrides): AnalyzerConfig {
    return {
        ...config,
        ...(cli.input !== undefined ? { input: cli.input } : {}),
        ...(cli.output !== undefined ? { output: cli.output } : {}),
        ...(cli.debug !== undefined ? { debug: cli.debug } : {}),
        resolver: {
            ...config.resolver,
            ...(cli.noCache ? { useCache: false } : {}),
        },
    };
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): AnalyzerConfig {
    let raw: unknown;
    try {
        const content = readFileSync(filePath, 'utf-8');
        raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
        throw new ConfigError(filePath, error instanceof Error ? error.message : String(error), { cause: error });
    }

    // An empty YAML file decodes to null
    const result = ConfigFileSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(issue => {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${path}: ${issue.message}`;
        });
        throw new ConfigError(filePath, issues.join('; '));
    }

    return mergeConfig(toPartialConfig(result.data));
}

/** Drop keys zod left as `undefined` so the result satisfies exact optional types */
function toPartialConfig(data: z.infer<typeof ConfigFileSchema>): PartialConfig {
    const naming = data.naming ?? {};
    const resolver = data.resolver ?? {};
    return {
        ...(data.input !== undefined ? { input: data.input } : {}),
        ...(data.output !== undefined ? { output: data.output } : {}),
        naming: {
            ...(naming.deduplication !== undefined ? { deduplication: naming.deduplication } : {}),
            ...(naming.nestedExtension !== undefined ? { nestedExtension: naming.nestedExtension } : {}),
            ...(naming.minNestedOperations !== undefined ? { minNestedOperations: naming.minNestedOperations } : {}),
        },
        resolver: {
            ...(resolver.cacheDir !== undefined ? { cacheDir: resolver.cacheDir } : {}),
            ...(resolver.timeoutMs !== undefined ? { timeoutMs: resolver.timeoutMs } : {}),
            ...(resolver.useCache !== undefined ? { useCache: resolver.useCache } : {}),
        },
        ...(data.includeTags !== undefined ? { includeTags: data.includeTags } : {}),
        ...(data.excludeTags !== undefined ? { excludeTags: data.excludeTags } : {}),
        ...(data.debug !== undefined ? { debug: data.debug } : {}),
    };
}
