/**
 * OpenApiParser — Load, Validate and Resolve an OpenAPI 3.x Document
 *
 * Accepts a file path or URL ({@link parseSpec}), or YAML / JSON text or
 * a pre-parsed object ({@link parseSpecDocument}). Validates the
 * top-level structure, then resolves every `$ref`. The result keeps both
 * the raw document (schema names are still visible in its `$ref`s) and
 * the resolved one.
 *
 * @module
 */
import { z } from 'zod';
import { StructuralError } from '../errors.js';
import { traceStage, type DebugObserverFn } from '../observability/DebugObserver.js';
import { createDocumentLoader, decodeDocument, getBaseDir, loadDocument } from './DocumentLoader.js';
import type { HttpCache } from './HttpCache.js';
import { extractAllReferences, resolveRefs, type DocumentLoader } from './RefResolver.js';
import {
    isJsonObject, isJsonValue, readString,
    type ApiServer, type JsonObject,
} from './types.js';

// ── Types ────────────────────────────────────────────────

export interface ParseOptions {
    /** Resolve `$ref`s (default: true) */
    readonly resolveRefs?: boolean;
    /** Working directory for relative sources (default: process.cwd()) */
    readonly cwd?: string;
    /** Base directory for relative external references; derived from the source by {@link parseSpec} */
    readonly baseDir?: string;
    readonly httpCache?: HttpCache;
    /** Bypass cached copies of remote documents */
    readonly refresh?: boolean;
    /** Replaces the default file / URL loader for external references */
    readonly loader?: DocumentLoader;
    readonly debug?: DebugObserverFn;
}

export interface ParsedSpec {
    /** The validated document before resolution */
    readonly raw: JsonObject;
    /** The document with every reference replaced (equal to `raw` when resolution is off) */
    readonly resolved: JsonObject;
    readonly baseDir: string;
}

export interface SpecMetadata {
    readonly title: string;
    readonly version: string;
    readonly description?: string;
    readonly license?: string;
    readonly contact?: JsonObject;
    readonly servers: readonly ApiServer[];
}

// ── Structure ────────────────────────────────────────────

const OpenApiDocumentSchema = z.object({
    openapi: z.string().refine(
        version => version.startsWith('3.'),
        version => ({ message: `Unsupported OpenAPI version "${version}"; only 3.x is supported` }),
    ),
    info: z.object({
        title: z.string(),
        version: z.union([z.string(), z.number()]),
    }),
    paths: z.record(z.unknown()).optional(),
    servers: z.array(z.object({ url: z.string() }).passthrough()).optional(),
});

/**
 * Check the fields every OpenAPI 3.x document needs.
 *
 * @throws {StructuralError} Listing every problem found
 */
export function validateSpec(doc: unknown): asserts doc is JsonObject {
    if (isJsonObject(doc) && typeof doc['swagger'] === 'string') {
        throw new StructuralError([
            `Swagger ${doc['swagger']} documents are not supported; convert to OpenAPI 3.x first`,
        ]);
    }

    const result = OpenApiDocumentSchema.safeParse(doc);
    if (!result.success) {
        throw new StructuralError(result.error.issues.map(issue => {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${path}: ${issue.message}`;
        }));
    }

    if (!isJsonValue(doc)) {
        throw new StructuralError(['(root): document contains values that are not JSON']);
    }
}

// ── Parser ───────────────────────────────────────────────

/**
 * Load a spec from a file path or URL, validate and resolve it.
 * Relative external references resolve against the spec's directory
 * (the working directory for URL sources).
 */
export async function parseSpec(source: string, options: ParseOptions = {}): Promise<ParsedSpec> {
    const cwd = options.cwd ?? process.cwd();
    const doc = await traceStage(options.debug, 'load', () => loadDocument(source, {
        cwd,
        ...(options.refresh ? { refresh: true } : {}),
        ...(options.httpCache ? { httpCache: options.httpCache } : {}),
        ...(options.debug ? { debug: options.debug } : {}),
    }));

    return parseSpecDocument(doc, { ...options, baseDir: options.baseDir ?? getBaseDir(source, cwd) });
}

/**
 * Validate and resolve an already-loaded document.
 *
 * @param input - YAML string, JSON string, or pre-parsed object
 */
export async function parseSpecDocument(input: unknown, options: ParseOptions = {}): Promise<ParsedSpec> {
    const doc = typeof input === 'string' ? decodeDocument(input.trim()) : input;
    const baseDir = options.baseDir ?? options.cwd ?? process.cwd();

    const spec = await traceStage(options.debug, 'validate', () => {
        validateSpec(doc);
        return doc;
    });

    if (options.resolveRefs === false) {
        return { raw: spec, resolved: spec, baseDir };
    }

    const loader = options.loader ?? createDocumentLoader({
        cwd: baseDir,
        ...(options.refresh ? { refresh: true } : {}),
        ...(options.httpCache ? { httpCache: options.httpCache } : {}),
        ...(options.debug ? { debug: options.debug } : {}),
    });

    const resolved = await traceStage(
        options.debug,
        'resolve',
        () => resolveRefs(spec, { baseDir, loader, ...(options.debug ? { debug: options.debug } : {}) }),
        () => `${extractAllReferences(spec).size} references`,
    );

    if (!isJsonObject(resolved)) {
        throw new StructuralError(['(root): document resolved to a non-object value']);
    }
    return { raw: spec, resolved, baseDir };
}

// ── Metadata ─────────────────────────────────────────────

export function extractServers(spec: JsonObject): ApiServer[] {
    const servers = spec['servers'];
    if (!Array.isArray(servers)) return [];

    const result: ApiServer[] = [];
    for (const server of servers) {
        if (!isJsonObject(server)) continue;
        const url = readString(server, 'url');
        if (url === undefined) continue;
        const description = readString(server, 'description');
        result.push({ url, ...(description ? { description } : {}) });
    }
    return result;
}

/** Title, version, description, license name, contact and servers */
export function extractMetadata(spec: JsonObject): SpecMetadata {
    const rawInfo = spec['info'];
    const info: JsonObject = isJsonObject(rawInfo) ? rawInfo : {};
    const version = info['version'];
    const description = readString(info, 'description');
    const rawLicense = info['license'];
    const license = isJsonObject(rawLicense) ? readString(rawLicense, 'name') : undefined;
    const contact = info['contact'];

    return {
        title: readString(info, 'title') ?? 'Untitled API',
        version: typeof version === 'string' || typeof version === 'number' ? String(version) : '0.0.0',
        ...(description ? { description } : {}),
        ...(license ? { license } : {}),
        ...(isJsonObject(contact) ? { contact } : {}),
        servers: extractServers(spec),
    };
}

/** URL of the first server, or an empty string */
export function getBaseUrl(spec: JsonObject): string {
    return extractServers(spec)[0]?.url ?? '';
}
