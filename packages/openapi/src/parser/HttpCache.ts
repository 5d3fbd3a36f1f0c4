/**
 * HttpCache — On-Disk Cache for Remote Documents
 *
 * Fetches a URL once and stores the decoded content as
 * `<sha256(url)>.json` in the cache directory (`~/.sdkgen/cache` by
 * default). Later fetches of the same URL are served from disk until
 * the entry is cleared or a fetch is forced.
 *
 * @module
 */
import { createHash } from 'node:crypto';
import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { FetchError } from '../errors.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';

// ── Types ────────────────────────────────────────────────

export interface HttpCacheOptions {
    /** Directory holding cache entries (default: `~/.sdkgen/cache`) */
    readonly cacheDir?: string;
    /** Request timeout in milliseconds (default: 30 000) */
    readonly timeoutMs?: number;
    /** Custom fetch function (default: globalThis.fetch) */
    readonly fetchFn?: typeof fetch;
    readonly debug?: DebugObserverFn;
}

export interface FetchOptions {
    /** Skip the disk entry and refetch */
    readonly force?: boolean;
}

const CacheEntrySchema = z.object({
    url: z.string(),
    content: z.unknown(),
});

export const DEFAULT_CACHE_DIR = join(homedir(), '.sdkgen', 'cache');
const DEFAULT_TIMEOUT_MS = 30_000;

// ── Cache ────────────────────────────────────────────────

export class HttpCache {
    readonly cacheDir: string;
    private readonly timeoutMs: number;
    private readonly fetchFn: typeof fetch;
    private readonly debug: DebugObserverFn | undefined;
    private readonly inFlight = new Map<string, Promise<unknown>>();

    constructor(options: HttpCacheOptions = {}) {
        this.cacheDir = options.cacheDir ?? DEFAULT_CACHE_DIR;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.fetchFn = options.fetchFn ?? globalThis.fetch;
        this.debug = options.debug;
    }

    /** Cache file for a URL; it may not exist yet */
    getCachePath(url: string): string {
        const hash = createHash('sha256').update(url).digest('hex');
        return join(this.cacheDir, `${hash}.json`);
    }

    /**
     * Fetch and decode a document, serving it from disk when cached.
     * Concurrent calls for one URL share a single request.
     *
     * @throws {FetchError} On a non-2xx response
     */
    fetch(url: string, options: FetchOptions = {}): Promise<unknown> {
        const pending = this.inFlight.get(url);
        if (pending) return pending;

        const request = this.load(url, options.force ?? false)
            .finally(() => this.inFlight.delete(url));
        this.inFlight.set(url, request);
        return request;
    }

    /** Remove every cache entry; the directory itself is kept */
    async clear(): Promise<void> {
        let entries: string[];
        try {
            entries = await readdir(this.cacheDir);
        } catch (error) {
            if (isNotFound(error)) return;
            throw error;
        }
        await Promise.all(
            entries
                .filter(name => name.endsWith('.json'))
                .map(name => rm(join(this.cacheDir, name), { force: true })),
        );
    }

    /** Remove the entry of one URL, if any */
    async clearUrl(url: string): Promise<void> {
        await rm(this.getCachePath(url), { force: true });
    }

    // ── Internal ─────────────────────────────────────────

    private async load(url: string, force: boolean): Promise<unknown> {
        const started = performance.now();
        const cachePath = this.getCachePath(url);

        if (!force) {
            const entry = await readEntry(cachePath);
            if (entry !== undefined) {
                this.emit(url, 'cache', started);
                return entry.content;
            }
        }

        const response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeoutMs) });
        if (!response.ok) {
            throw new FetchError(url, response.status, response.statusText);
        }

        const content = await decodeResponse(url, response);
        await mkdir(this.cacheDir, { recursive: true });
        await writeFile(cachePath, JSON.stringify({ url, content }, null, 2), 'utf-8');

        this.emit(url, 'network', started);
        return content;
    }

    private emit(url: string, source: 'cache' | 'network', started: number): void {
        this.debug?.({
            type: 'fetch',
            locator: url,
            source,
            durationMs: performance.now() - started,
            timestamp: Date.now(),
        });
    }
}

// ── Helpers ──────────────────────────────────────────────

/** Read a cache entry; missing or unreadable entries count as a miss */
async function readEntry(cachePath: string): Promise<z.infer<typeof CacheEntrySchema> | undefined> {
    let text: string;
    try {
        text = await readFile(cachePath, 'utf-8');
    } catch (error) {
        if (isNotFound(error)) return undefined;
        throw error;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch {
        return undefined;
    }
    const parsed = CacheEntrySchema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
}

/** JSON by content type, YAML by content type or extension, JSON otherwise */
async function decodeResponse(url: string, response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('json')) {
        return await response.json();
    }

    const text = await response.text();
    if (contentType.includes('yaml') || /\.ya?ml$/i.test(new URL(url).pathname)) {
        return parseYaml(text);
    }
    return JSON.parse(text);
}

export function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
