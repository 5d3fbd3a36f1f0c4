import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { analyzeSpec, buildIR } from '../../src/pipeline/buildIR.js';
import { mergeConfig, type PartialConfig } from '../../src/config/AnalyzerConfig.js';
import { parseSpecDocument } from '../../src/parser/OpenApiParser.js';
import { RefResolutionError, StructuralError } from '../../src/errors.js';
import type { DebugEvent } from '../../src/observability/DebugObserver.js';

// ── Pet Clinic Spec ──

const CLINIC_YAML = `
openapi: "3.0.3"
info:
  title: Pet Clinic
  version: "1.2.0"
  description: Clinic records
servers:
  - url: https://clinic.example.com
tags:
  - name: pets
    description: Patients
paths:
  /v1/pets:
    get:
      tags: [pets]
      parameters:
        - name: page_size
          in: query
      responses:
        "200":
          description: ok
          content:
            application/json:
              schema:
                type: array
                items:
                  $ref: '#/components/schemas/Pet'
    post:
      tags: [pets]
      requestBody:
        content:
          application/json:
            schema:
              $ref: '#/components/schemas/Pet'
      responses:
        "201":
          description: created
  /v1/pets/{pet_id}:
    get:
      tags: [pets]
      operationId: get
      responses:
        default:
          $ref: 'common.yaml#/responses/Error'
  /v1/pets/{pet_id}/visits/export:
    post:
      tags: [pets]
      responses:
        "202":
          description: accepted
  /v2/owners:
    get:
      responses:
        "200":
          description: ok
  /v2/owners/{owner_id}:
    head:
      responses: {}
components:
  schemas:
    Pet:
      allOf:
        - $ref: '#/components/schemas/Animal'
        - type: object
          description: A pet
          required: [pet_name]
          properties:
            pet_name:
              type: string
    Animal:
      type: object
      required: [animal_id]
      properties:
        animal_id:
          type: integer
        parent:
          $ref: '#/components/schemas/Animal'
    Shape:
      oneOf:
        - $ref: '#/components/schemas/Circle'
        - $ref: 'common.yaml#/schemas/Square'
      discriminator:
        propertyName: kind
    Circle:
      type: object
      properties:
        radius:
          type: number
`;

const COMMON_YAML = `
responses:
  Error:
    description: error
    content:
      application/json:
        schema:
          $ref: '#/schemas/Problem'
schemas:
  Problem:
    type: object
    properties:
      detail:
        type: string
  Square:
    type: object
    properties:
      side:
        type: number
`;

// ============================================================================
// Full Pipeline: load → resolve → analyze
// ============================================================================

describe('Pipeline', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'sdkgen-pipeline-'));
        await writeFile(join(dir, 'clinic.yaml'), CLINIC_YAML, 'utf-8');
        await writeFile(join(dir, 'common.yaml'), COMMON_YAML, 'utf-8');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    const analyze = (config: PartialConfig = {}, debug?: (event: DebugEvent) => void) =>
        analyzeSpec('clinic.yaml', {
            cwd: dir,
            config: { ...config, resolver: { cacheDir: join(dir, 'cache') } },
            ...(debug ? { debug } : {}),
        });

    it('should extract API metadata', async () => {
        const ir = await analyze();

        expect(ir.title).toBe('Pet Clinic');
        expect(ir.version).toBe('1.2.0');
        expect(ir.description).toBe('Clinic records');
        expect(ir.baseUrl).toBe('https://clinic.example.com');
    });

    it('should build resources with inferred method names', async () => {
        const ir = await analyze();
        const [pets, owners] = ir.resources;

        expect(ir.resources.map(r => r.name)).toEqual(['pets', 'owners']);
        expect(pets).toMatchObject({
            description: 'Patients',
            pathPrefix: '/v1',
            requiresId: true,
            idParamName: 'pet_id',
        });
        expect(pets?.methodNames).toEqual({
            'GET /v1/pets': 'list',
            'POST /v1/pets': 'create',
            'GET /v1/pets/{pet_id}': 'get',
            'POST /v1/pets/{pet_id}/visits/export': 'export',
        });
        expect(pets?.operations.map(op => op.nameTier))
            .toEqual(['method-shape', 'method-shape', 'declared-id', 'rpc-action']);
        expect(owners?.methodNames).toEqual({
            'GET /v2/owners': 'owners',
            'HEAD /v2/owners/{owner_id}': 'head',
        });
    });

    it('should resolve references into external documents', async () => {
        const ir = await analyze();
        const getPet = ir.resources[0]?.operations[2];

        expect(getPet?.responses['default']).toEqual({
            description: 'error',
            content: {
                'application/json': {
                    schema: { type: 'object', properties: { detail: { type: 'string' } } },
                },
            },
        });
    });

    it('should assign resources to version namespaces', async () => {
        const ir = await analyze();

        expect(ir.namespaces.map(ns => ({
            name: ns.name,
            pathPrefix: ns.pathPrefix,
            resources: ns.resources.map(r => r.name),
        }))).toEqual([
            { name: 'v1', pathPrefix: '/v1', resources: ['pets'] },
            { name: 'v2', pathPrefix: '/v2', resources: ['owners'] },
        ]);
    });

    it('should classify and merge schema compositions', async () => {
        const ir = await analyze();
        const byName = new Map(ir.schemas.map(schema => [schema.name, schema]));

        expect([...byName.keys()]).toEqual(['Pet', 'Animal', 'Shape', 'Circle']);
        expect(byName.get('Pet')?.composition).toEqual({
            kind: 'allOf',
            members: [
                'Animal',
                { type: 'object', description: 'A pet', required: ['pet_name'], properties: { pet_name: { type: 'string' } } },
            ],
        });
        expect(byName.get('Pet')?.merged).toEqual({
            type: 'object',
            properties: {
                animal_id: { type: 'integer' },
                parent: { $circular_ref: '#/components/schemas/Animal' },
                pet_name: { type: 'string' },
            },
            required: ['animal_id', 'pet_name'],
            description: 'A pet',
        });
        expect(byName.get('Shape')?.composition).toEqual({
            kind: 'oneOf',
            members: ['Circle', 'Square'],
            discriminator: { propertyName: 'kind', mapping: {} },
        });
        expect(byName.get('Animal')?.composition).toBeUndefined();
        expect(byName.get('Circle')?.merged).toBeUndefined();
    });

    it('should detect naming conventions and collect diagnostics', async () => {
        const ir = await analyze();

        expect(ir.conventions).toEqual({ request: 'snake_case', response: 'original', parameter: 'snake_case' });
        expect(ir.diagnostics).toEqual([{
            severity: 'warning',
            code: 'method-fallback',
            message: 'No naming rule matched; using the method name "head"',
            subject: 'HEAD /v2/owners/{owner_id}',
        }]);
    });

    it('should produce a JSON-serializable IR', async () => {
        const ir = await analyze();

        expect(JSON.parse(JSON.stringify(ir))).toEqual(ir);
    });

    it('should honour tag filters from the config', async () => {
        const ir = await analyze({ excludeTags: ['pets'] });

        expect(ir.resources.map(r => r.name)).toEqual(['owners']);
        expect(ir.namespaces[0]?.resources).toEqual([]);
    });

    it('should emit every pipeline stage in order', async () => {
        const events: DebugEvent[] = [];
        await analyze({}, event => events.push(event));

        const stages = events.flatMap(event => event.type === 'stage' ? [event.stage] : []);
        expect(stages).toEqual(['load', 'validate', 'resolve', 'analyze']);

        const fetched = events.flatMap(event => event.type === 'fetch' ? [event.locator] : []);
        expect(fetched).toEqual([join(dir, 'clinic.yaml'), join(dir, 'common.yaml')]);

        const diagnostics = events.filter(event => event.type === 'diagnostic');
        expect(diagnostics).toHaveLength(1);
    });

    it('should reject Swagger documents', async () => {
        await writeFile(join(dir, 'swagger.yaml'), 'swagger: "2.0"\ninfo: { title: Old, version: "1" }\n', 'utf-8');

        await expect(analyzeSpec('swagger.yaml', { cwd: dir })).rejects.toBeInstanceOf(StructuralError);
    });

    it('should reject unresolvable references', async () => {
        await writeFile(join(dir, 'broken.yaml'), [
            'openapi: 3.0.0',
            'info: { title: Broken, version: "1" }',
            'components:',
            '  schemas:',
            '    A:',
            "      $ref: '#/components/schemas/Missing'",
            '',
        ].join('\n'), 'utf-8');

        await expect(analyzeSpec('broken.yaml', { cwd: dir })).rejects.toBeInstanceOf(RefResolutionError);
    });
});

describe('buildIR()', () => {
    it('should apply nested-resource settings from the config', async () => {
        const parsed = await parseSpecDocument({
            openapi: '3.1.0',
            info: { title: 'Stages', version: '1' },
            paths: {
                '/stages/{id}/notes': {
                    get: { tags: ['stages'], 'x-sub': 'notes' },
                },
                '/stages/{id}/instruct': {
                    post: { tags: ['stages'], operationId: 'stages_instruct_create' },
                },
            },
        });

        const strict = buildIR(parsed);
        expect(strict.resources[0]?.nestedGroups).toEqual({});

        const loose = buildIR(parsed, mergeConfig({ naming: { nestedExtension: 'x-sub', minNestedOperations: 1 } }));
        expect(Object.keys(loose.resources[0]?.nestedGroups ?? {})).toEqual(['notes', 'instruct']);
    });

    it('should fall back to a server namespace', async () => {
        const parsed = await parseSpecDocument({
            openapi: '3.0.0',
            info: { title: 'Server', version: '1' },
            servers: [{ url: 'https://api.example.com/beta' }],
            paths: { '/items': { get: { tags: ['items'] } } },
        });

        const ir = buildIR(parsed);
        expect(ir.namespaces).toHaveLength(1);
        expect(ir.namespaces[0]).toMatchObject({ name: 'beta', pathPrefix: '/beta', source: 'server' });
        expect(ir.namespaces[0]?.resources.map(r => r.name)).toEqual(['items']);
    });
});
