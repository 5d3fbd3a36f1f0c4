import { describe, it, expect } from 'vitest';
import { mergeConfig, DEFAULT_CONFIG } from '../../src/config/AnalyzerConfig.js';

// ============================================================================
// AnalyzerConfig Tests
// ============================================================================

describe('AnalyzerConfig', () => {
    // ── Default Config ──

    describe('DEFAULT_CONFIG', () => {
        it('should deduplicate method names by default', () => {
            expect(DEFAULT_CONFIG.naming.deduplication).toBe(true);
        });

        it('should read nested resources from x-nested-resource', () => {
            expect(DEFAULT_CONFIG.naming.nestedExtension).toBe('x-nested-resource');
            expect(DEFAULT_CONFIG.naming.minNestedOperations).toBe(2);
        });

        it('should cache remote documents with a 30s timeout', () => {
            expect(DEFAULT_CONFIG.resolver).toEqual({ timeoutMs: 30_000, useCache: true });
        });

        it('should have empty tag filters and debug off', () => {
            expect(DEFAULT_CONFIG.includeTags).toEqual([]);
            expect(DEFAULT_CONFIG.excludeTags).toEqual([]);
            expect(DEFAULT_CONFIG.debug).toBe(false);
        });
    });

    // ── mergeConfig ──

    describe('mergeConfig()', () => {
        it('should return defaults for empty partial', () => {
            expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
        });

        it('should override single naming fields', () => {
            const config = mergeConfig({ naming: { minNestedOperations: 3 } });

            expect(config.naming).toEqual({
                deduplication: true,
                nestedExtension: 'x-nested-resource',
                minNestedOperations: 3,
            });
        });

        it('should merge resolver settings', () => {
            const config = mergeConfig({ resolver: { cacheDir: '/tmp/sdkgen', useCache: false } });

            expect(config.resolver).toEqual({ cacheDir: '/tmp/sdkgen', timeoutMs: 30_000, useCache: false });
        });

        it('should carry input, output, tags and debug', () => {
            const config = mergeConfig({
                input: 'api.yaml',
                output: 'ir.json',
                includeTags: ['pets'],
                excludeTags: ['internal'],
                debug: true,
            });

            expect(config.input).toBe('api.yaml');
            expect(config.output).toBe('ir.json');
            expect(config.includeTags).toEqual(['pets']);
            expect(config.excludeTags).toEqual(['internal']);
            expect(config.debug).toBe(true);
        });

        it('should not add input or output keys when absent', () => {
            const config = mergeConfig({});

            expect('input' in config).toBe(false);
            expect('output' in config).toBe(false);
        });
    });
});
