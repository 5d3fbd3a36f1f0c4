/**
 * DocumentLoader — File and URL Loading
 *
 * Turns a locator (file path or http(s) URL) into a decoded document.
 * URLs go through the {@link HttpCache}; files are read from disk and
 * decoded as JSON or YAML by extension.
 *
 * @module
 */
import { readFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { DocumentNotFoundError } from '../errors.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { HttpCache, isNotFound } from './HttpCache.js';
import type { DocumentLoader } from './RefResolver.js';

export interface LoaderOptions {
    /** Cache used for URLs (default: a new {@link HttpCache}) */
    readonly httpCache?: HttpCache;
    /** Directory relative file paths are resolved against (default: cwd) */
    readonly cwd?: string;
    /** Bypass cached copies of remote documents */
    readonly refresh?: boolean;
    readonly debug?: DebugObserverFn;
}

// ── Public API ───────────────────────────────────────────

export function isUrl(source: string): boolean {
    return /^https?:\/\//i.test(source);
}

/**
 * Directory relative references of a spec resolve against: the spec's
 * own directory for files, the working directory for URL sources.
 */
export function getBaseDir(source: string, cwd: string = process.cwd()): string {
    if (isUrl(source)) return cwd;
    return dirname(resolve(cwd, source));
}

/**
 * Build the `DocumentLoader` the resolver uses for external references.
 */
export function createDocumentLoader(options: LoaderOptions = {}): DocumentLoader {
    const httpCache = options.httpCache ?? new HttpCache(options.debug ? { debug: options.debug } : {});
    return (locator: string) => loadDocument(locator, { ...options, httpCache });
}

/**
 * Load and decode one document.
 *
 * @throws {DocumentNotFoundError} If a file does not exist
 * @throws {FetchError} If a URL answers with a non-2xx status
 */
export async function loadDocument(source: string, options: LoaderOptions = {}): Promise<unknown> {
    if (isUrl(source)) {
        const cache = options.httpCache ?? new HttpCache(options.debug ? { debug: options.debug } : {});
        return cache.fetch(source, { force: options.refresh ?? false });
    }

    const started = performance.now();
    const filePath = resolve(options.cwd ?? process.cwd(), source);

    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (error) {
        if (isNotFound(error)) throw new DocumentNotFoundError(filePath);
        throw error;
    }

    const decoded = decodeDocument(content, filePath);
    options.debug?.({
        type: 'fetch',
        locator: filePath,
        source: 'file',
        durationMs: performance.now() - started,
        timestamp: Date.now(),
    });
    return decoded;
}

/**
 * Decode document text. `.json` files are parsed as JSON; everything
 * else goes through the YAML parser, which also accepts JSON.
 */
export function decodeDocument(content: string, fileName = ''): unknown {
    if (extname(fileName).toLowerCase() === '.json') {
        return JSON.parse(content);
    }
    return parseYaml(content);
}
