/**
 * NamingAnalyzer — Field and Parameter Naming Conventions
 *
 * Samples property and parameter names to tell whether an API speaks
 * snake_case or camelCase on the wire.
 *
 * @module
 */
import { HTTP_METHODS } from '../mapper/EndpointAnalyzer.js';
import {
    isJsonObject, readString,
    type FieldNaming, type JsonObject, type NamingConventions,
} from '../parser/types.js';
import { detectNamingConvention } from './CaseConverter.js';

/** Names looked at per schema or parameter list */
const SAMPLE_SIZE = 10;

/**
 * Dominant convention among the first property names of a schema.
 * `original` when it has no properties or no camelCase name wins.
 */
export function detectFieldNaming(schema: JsonObject): FieldNaming {
    const properties = schema['properties'];
    if (!isJsonObject(properties)) return 'original';

    let snake = 0;
    let camel = 0;
    for (const name of Object.keys(properties).slice(0, SAMPLE_SIZE)) {
        const convention = detectNamingConvention(name);
        if (convention === 'snake_case') snake++;
        else if (convention === 'camelCase') camel++;
    }
    return decide(snake, camel);
}

/** Dominant convention among the first parameter names */
export function detectParameterNaming(parameters: readonly JsonObject[]): FieldNaming {
    let snake = 0;
    let camel = 0;
    for (const parameter of parameters.slice(0, SAMPLE_SIZE)) {
        const name = readString(parameter, 'name') ?? '';
        if (name.includes('_')) snake++;
        else if (/[A-Z]/.test(name)) camel++;
    }
    return decide(snake, camel);
}

/**
 * Conventions of a whole spec. Requests are always snake_case; responses
 * follow the first component schema; parameters follow every operation's
 * parameters. Both default to camelCase when there is nothing to sample.
 */
export function analyzeNamingConventions(spec: JsonObject): NamingConventions {
    const components = spec['components'];
    const schemas = isJsonObject(components) ? components['schemas'] : undefined;
    const firstSchema = isJsonObject(schemas) ? Object.values(schemas)[0] : undefined;

    const parameters = collectParameters(spec);

    return {
        request: 'snake_case',
        response: isJsonObject(schemas) && Object.keys(schemas).length > 0
            ? detectFieldNaming(isJsonObject(firstSchema) ? firstSchema : {})
            : 'camelCase',
        parameter: parameters.length > 0 ? detectParameterNaming(parameters) : 'camelCase',
    };
}

function collectParameters(spec: JsonObject): JsonObject[] {
    const paths = spec['paths'];
    if (!isJsonObject(paths)) return [];

    const collected: JsonObject[] = [];
    for (const pathItem of Object.values(paths)) {
        if (!isJsonObject(pathItem)) continue;
        for (const method of HTTP_METHODS) {
            const operation = pathItem[method];
            const parameters = isJsonObject(operation) ? operation['parameters'] : undefined;
            if (Array.isArray(parameters)) collected.push(...parameters.filter(isJsonObject));
        }
    }
    return collected;
}

function decide(snake: number, camel: number): FieldNaming {
    if (snake > camel) return 'snake_case';
    if (camel > 0) return 'camelCase';
    return 'original';
}
