#!/usr/bin/env node
/**
 * CLI Entry Point — sdkgen-ir
 *
 * Usage:
 *   sdkgen-ir analyze -i <spec> [-o <ir.json>] [--config <sdkgen.yaml>] [--debug] [--no-cache]
 *   sdkgen-ir clear-cache [--config <sdkgen.yaml>]
 *
 * @module
 */
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { loadConfig, applyCliOverrides, type CliOverrides } from './config/ConfigLoader.js';
import type { AnalyzerConfig } from './config/AnalyzerConfig.js';
import { AnalysisError } from './errors.js';
import { HttpCache } from './parser/HttpCache.js';
import { analyzeSpec } from './pipeline/buildIR.js';

// ── Arg Parsing ──────────────────────────────────────────

interface RawCliArgs {
    command: string;
    input?: string;
    output?: string;
    config?: string;
    debug?: boolean;
    noCache?: boolean;
}

function parseArgs(argv: string[]): RawCliArgs {
    const args = argv.slice(2);
    const command = args[0] ?? '';

    const result: Record<string, string | undefined> = {};
    const flags = new Set<string>();

    for (let i = 1; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '-i':
            case '--input':
                result['input'] = args[++i];
                break;
            case '-o':
            case '--output':
                result['output'] = args[++i];
                break;
            case '-c':
            case '--config':
                result['config'] = args[++i];
                break;
            case '--debug':
                flags.add('debug');
                break;
            case '--no-cache':
                flags.add('noCache');
                break;
        }
    }

    return {
        command,
        ...(result['input'] !== undefined ? { input: result['input'] } : {}),
        ...(result['output'] !== undefined ? { output: result['output'] } : {}),
        ...(result['config'] !== undefined ? { config: result['config'] } : {}),
        ...(flags.has('debug') ? { debug: true } : {}),
        ...(flags.has('noCache') ? { noCache: true } : {}),
    };
}

// ── Commands ─────────────────────────────────────────────

async function runAnalyze(rawArgs: RawCliArgs): Promise<void> {
    // Load config (YAML file → defaults → CLI overrides)
    const overrides: CliOverrides = {
        ...(rawArgs.input !== undefined ? { input: rawArgs.input } : {}),
        ...(rawArgs.output !== undefined ? { output: rawArgs.output } : {}),
        ...(rawArgs.debug !== undefined ? { debug: rawArgs.debug } : {}),
        ...(rawArgs.noCache !== undefined ? { noCache: rawArgs.noCache } : {}),
    };
    const config: AnalyzerConfig = applyCliOverrides(loadConfig(rawArgs.config), overrides);

    if (!config.input) {
        console.error('Error: --input (-i) is required (or set `input` in config file).');
        console.error('Usage: sdkgen-ir analyze -i <spec.yaml> -o <ir.json>');
        process.exitCode = 1;
        return;
    }

    console.log(`📂 Analyzing: ${config.input}`);
    const ir = await analyzeSpec(config.input, { config });

    console.log(`✅ Parsed: ${ir.title} v${ir.version}`);
    console.log(`📋 Resources: ${ir.resources.length}`);
    console.log(`🧭 Namespaces: ${ir.namespaces.map(ns => ns.name).join(', ') || '(none)'}`);
    console.log(`🧩 Schemas: ${ir.schemas.length}`);
    for (const diagnostic of ir.diagnostics) {
        console.warn(`⚠️  ${diagnostic.subject}: ${diagnostic.message}`);
    }

    const outFile = resolve(config.output ?? './sdkgen-ir.json');
    mkdirSync(dirname(outFile), { recursive: true });
    writeFileSync(outFile, `${JSON.stringify(ir, null, 2)}\n`, 'utf-8');

    console.log(`\n🎉 IR written to ${outFile}`);
}

async function runClearCache(rawArgs: RawCliArgs): Promise<void> {
    const config = loadConfig(rawArgs.config);
    const cache = new HttpCache(config.resolver.cacheDir !== undefined ? { cacheDir: config.resolver.cacheDir } : {});
    await cache.clear();
    console.log(`🧹 Cleared ${cache.cacheDir}`);
}

function printHelp(): void {
    console.log(`
sdkgen-ir — OpenAPI 3.x → SDK Intermediate Representation

USAGE:
  sdkgen-ir analyze -i <spec> -o <ir.json> [options]
  sdkgen-ir clear-cache

COMMANDS:
  analyze       Resolve and analyze a spec, write the IR as JSON
  clear-cache   Remove cached remote documents

OPTIONS:
  -i, --input <file|url>     OpenAPI spec (YAML or JSON)
  -o, --output <file>        IR output file (default: ./sdkgen-ir.json)
  -c, --config <file>        Config file (default: auto-detect sdkgen.yaml)
  --debug                    Print resolver and pipeline events
  --no-cache                 Refetch remote documents
  --help                     Show this help message

CONFIG FILE (sdkgen.yaml):
  input: ./petstore.yaml
  output: ./build/ir.json
  naming:
    deduplication: true
    nestedExtension: x-nested-resource
    minNestedOperations: 2
  resolver:
    timeoutMs: 30000
    useCache: true
  includeTags: []
  excludeTags: []

EXAMPLES:
  sdkgen-ir analyze -i petstore.yaml -o ./ir.json
  sdkgen-ir analyze -i https://example.com/openapi.json --no-cache
`);
}

function reportFailure(error: unknown): void {
    if (error instanceof AnalysisError) {
        console.error(`Error [${error.code}]: ${error.message}`);
    } else {
        console.error(error);
    }
    process.exitCode = 1;
}

// ── Main ─────────────────────────────────────────────────

const cliArgs = parseArgs(process.argv);

switch (cliArgs.command) {
    case 'analyze':
        runAnalyze(cliArgs).catch(reportFailure);
        break;
    case 'clear-cache':
        runClearCache(cliArgs).catch(reportFailure);
        break;
    case '--help':
    case 'help':
    case '':
        printHelp();
        break;
    default:
        console.error(`Unknown command: "${cliArgs.command}". Use --help for usage.`);
        process.exitCode = 1;
}
