import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, applyCliOverrides } from '../../src/config/ConfigLoader.js';
import { DEFAULT_CONFIG } from '../../src/config/AnalyzerConfig.js';
import { ConfigError } from '../../src/errors.js';

// ============================================================================
// ConfigLoader Tests
// ============================================================================

describe('ConfigLoader', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'sdkgen-config-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe('loadConfig()', () => {
        it('should fall back to defaults when no file exists', () => {
            expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
        });

        it('should auto-detect sdkgen.yaml', async () => {
            await writeFile(join(dir, 'sdkgen.yaml'), [
                'input: ./petstore.yaml',
                'naming:',
                '  deduplication: false',
                'excludeTags: [internal]',
                '',
            ].join('\n'), 'utf-8');

            const config = loadConfig(undefined, dir);

            expect(config.input).toBe('./petstore.yaml');
            expect(config.naming.deduplication).toBe(false);
            expect(config.naming.minNestedOperations).toBe(2);
            expect(config.excludeTags).toEqual(['internal']);
        });

        it('should prefer sdkgen.yaml over sdkgen.json', async () => {
            await writeFile(join(dir, 'sdkgen.json'), '{"output": "from-json.json"}', 'utf-8');
            await writeFile(join(dir, 'sdkgen.yaml'), 'output: from-yaml.json\n', 'utf-8');

            expect(loadConfig(undefined, dir).output).toBe('from-yaml.json');
        });

        it('should load an explicit JSON path', async () => {
            await writeFile(join(dir, 'custom.json'), '{"resolver": {"timeoutMs": 500}}', 'utf-8');

            expect(loadConfig('custom.json', dir).resolver.timeoutMs).toBe(500);
        });

        it('should accept an empty YAML file', async () => {
            await writeFile(join(dir, 'sdkgen.yml'), '', 'utf-8');

            expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
        });

        it('should reject a missing explicit path', () => {
            expect(() => loadConfig('absent.yaml', dir))
                .toThrow(`Invalid config "${join(dir, 'absent.yaml')}": file not found`);
        });

        it('should reject fields of the wrong type', async () => {
            await writeFile(join(dir, 'sdkgen.yaml'), 'naming:\n  minNestedOperations: two\n', 'utf-8');

            expect(() => loadConfig(undefined, dir)).toThrow(ConfigError);
            expect(() => loadConfig(undefined, dir)).toThrow('naming.minNestedOperations: Expected number, received string');
        });

        it('should reject unknown keys', async () => {
            await writeFile(join(dir, 'sdkgen.yaml'), 'features:\n  tags: true\n', 'utf-8');

            expect(() => loadConfig(undefined, dir)).toThrow(ConfigError);
        });

        it('should wrap parse failures', async () => {
            await writeFile(join(dir, 'sdkgen.json'), '{ broken', 'utf-8');

            expect(() => loadConfig(undefined, dir)).toThrow(ConfigError);
        });
    });

    describe('applyCliOverrides()', () => {
        it('should let CLI values win', () => {
            const config = applyCliOverrides(
                { ...DEFAULT_CONFIG, input: 'file.yaml' },
                { input: 'cli.yaml', output: 'out.json', debug: true, noCache: true },
            );

            expect(config.input).toBe('cli.yaml');
            expect(config.output).toBe('out.json');
            expect(config.debug).toBe(true);
            expect(config.resolver.useCache).toBe(false);
        });

        it('should leave the config alone without overrides', () => {
            expect(applyCliOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
        });
    });
});
