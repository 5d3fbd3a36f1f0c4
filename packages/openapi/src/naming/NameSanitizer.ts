/**
 * NameSanitizer — Safe Identifiers from Arbitrary Strings
 *
 * Schema, tag and enum names in a spec can hold any character. These
 * helpers turn them into identifiers a code generator can emit; words
 * reserved in generated code get a suffix.
 *
 * @module
 */
import { readFileSync } from 'node:fs';
import { toPascalCase, toSnakeCase } from './CaseConverter.js';

const RESERVED_WORDS: ReadonlySet<string> = loadReservedWords();

function loadReservedWords(): Set<string> {
    const raw: unknown = JSON.parse(readFileSync(new URL('./reserved-words.json', import.meta.url), 'utf-8'));
    if (!Array.isArray(raw)) return new Set();
    return new Set(raw.filter((word): word is string => typeof word === 'string'));
}

export function isReservedWord(name: string): boolean {
    return RESERVED_WORDS.has(name);
}

/** Illegal characters to `_`, leading digit prefixed with `n`, underscores collapsed */
function cleanIdentifier(name: string): string {
    let cleaned = name.replace(/[^a-zA-Z0-9_]/g, '_');
    if (/^[0-9]/.test(cleaned)) cleaned = `n${cleaned}`;
    return cleaned.replace(/_+/g, '_').replace(/^_+|_+$/g, '');
}

/**
 * Make a string a valid identifier.
 *
 * @param suffix - Used for an empty result, and appended to a reserved word
 *
 * @example
 * sanitizeIdentifier('my-variable') → 'my_variable'
 * sanitizeIdentifier('123abc')      → 'n123abc'
 * sanitizeIdentifier('class')       → 'classvalue'
 * sanitizeIdentifier('!!!')         → 'value'
 */
export function sanitizeIdentifier(name: string, suffix = 'value'): string {
    const sanitized = cleanIdentifier(name);
    if (!sanitized) return suffix;
    return isReservedWord(sanitized) ? `${sanitized}${suffix}` : sanitized;
}

/**
 * Identifier used as a property or method name, where reserved words
 * are legal (`client.users.delete()`).
 *
 * @example
 * sanitizePropertyName('user-profile') → 'user_profile'
 * sanitizePropertyName('2024')         → 'n2024'
 * sanitizePropertyName('delete')       → 'delete'
 */
export function sanitizePropertyName(name: string, fallback = 'value'): string {
    return cleanIdentifier(name) || fallback;
}

/**
 * @example
 * sanitizeClassName('my_class') → 'MyClass'
 * sanitizeClassName('class')    → 'Classclass'
 */
export function sanitizeClassName(name: string): string {
    return toPascalCase(sanitizeIdentifier(name, 'Class'));
}

/**
 * @example
 * sanitizeEnumMemberName('in-progress') → 'IN_PROGRESS'
 * sanitizeEnumMemberName('HTTPError')   → 'HTTP_ERROR'
 */
export function sanitizeEnumMemberName(name: string): string {
    return toSnakeCase(sanitizeIdentifier(name, 'VALUE')).toUpperCase();
}

/**
 * @example
 * sanitizePackageName('My Awesome-SDK') → 'my_awesome_sdk'
 */
export function sanitizePackageName(name: string): string {
    return sanitizeIdentifier(name.toLowerCase().replace(/[-\s]+/g, '_'), 'sdk');
}
