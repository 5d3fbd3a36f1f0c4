/**
 * Analysis Errors
 *
 * Every fatal failure of a build is one of the classes below. Each carries
 * a stable `code` plus the structured fields a caller needs to point at
 * the source location. Non-fatal findings are `Diagnostic` records instead.
 *
 * @module
 */

export type AnalysisErrorCode = 'STRUCTURAL' | 'REFERENCE' | 'NOT_FOUND' | 'FETCH' | 'CONFIG';

/** Base class so callers can catch every analysis failure at once */
export abstract class AnalysisError extends Error {
    abstract readonly code: AnalysisErrorCode;
}

/**
 * The document is not a usable OpenAPI 3.x specification
 * (missing top-level fields, unsupported major version).
 */
export class StructuralError extends AnalysisError {
    override readonly code = 'STRUCTURAL';
    /** One line per problem, e.g. `info.title: Required` */
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super(`Invalid OpenAPI document:\n${issues.map(issue => `  • ${issue}`).join('\n')}`);
        this.name = 'StructuralError';
        this.issues = Object.freeze([...issues]);
    }
}

/** A reference points at a key or array index that does not exist */
export class RefResolutionError extends AnalysisError {
    override readonly code = 'REFERENCE';
    /** The reference as written in the document */
    readonly ref: string;
    /** The pointer prefix at which navigation failed */
    readonly pointer: string;

    constructor(ref: string, pointer: string, reason: string, options?: { cause?: unknown }) {
        super(`Cannot resolve "${ref}" at "${pointer}": ${reason}`, options);
        this.name = 'RefResolutionError';
        this.ref = ref;
        this.pointer = pointer;
    }
}

/** An external document (file) does not exist */
export class DocumentNotFoundError extends AnalysisError {
    override readonly code = 'NOT_FOUND';
    readonly locator: string;

    constructor(locator: string) {
        super(`External document not found: "${locator}"`);
        this.name = 'DocumentNotFoundError';
        this.locator = locator;
    }
}

/** A remote document answered with a non-success HTTP status */
export class FetchError extends AnalysisError {
    override readonly code = 'FETCH';
    readonly url: string;
    readonly status: number;

    constructor(url: string, status: number, statusText: string) {
        super(`GET ${url} failed: ${status} ${statusText}`);
        this.name = 'FetchError';
        this.url = url;
        this.status = status;
    }
}

/** A configuration file is missing or does not match the expected shape */
export class ConfigError extends AnalysisError {
    override readonly code = 'CONFIG';
    readonly filePath: string;

    constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
        super(`Invalid config "${filePath}": ${reason}`, options);
        this.name = 'ConfigError';
        this.filePath = filePath;
    }
}
