/**
 * CaseConverter — Identifier Case Helpers
 *
 * Pure string transforms used wherever the IR derives a name.
 *
 * @module
 */
import type { NamingConvention } from '../parser/types.js';

// ── Case Converters ──────────────────────────────────────

/**
 * Convert camelCase, PascalCase, kebab-case or spaced words to snake_case.
 *
 * @example
 * toSnakeCase('getPetById')   → 'get_pet_by_id'
 * toSnakeCase('HTTPResponse') → 'http_response'
 * toSnakeCase('my-kebab case') → 'my_kebab_case'
 */
export function toSnakeCase(str: string): string {
    return str
        .replace(/[\s-]+/g, '_')
        // Insert underscore before uppercase letters (camelCase boundaries)
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        // Insert underscore between consecutive uppercase followed by lowercase
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .toLowerCase()
        .replace(/_+/g, '_')
        .replace(/^_|_$/g, '');
}

/**
 * Convert a string to PascalCase.
 *
 * @example
 * toPascalCase('pet')          → 'Pet'
 * toPascalCase('user-account') → 'UserAccount'
 * toPascalCase('find_pets')    → 'FindPets'
 */
export function toPascalCase(str: string): string {
    return str
        .split(/[-_\s.]+/)
        .filter(Boolean)
        .map(segment => segment.charAt(0).toUpperCase() + segment.slice(1).toLowerCase())
        .join('');
}

/**
 * Convert a string to camelCase.
 *
 * @example
 * toCamelCase('pet_store')  → 'petStore'
 * toCamelCase('user-name')  → 'userName'
 */
export function toCamelCase(str: string): string {
    const pascal = toPascalCase(str);
    return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

// ── Detection ────────────────────────────────────────────

/**
 * Classify a single identifier.
 *
 * @example
 * detectNamingConvention('first_name') → 'snake_case'
 * detectNamingConvention('MAX_SIZE')   → 'SCREAMING_SNAKE_CASE'
 * detectNamingConvention('firstName')  → 'camelCase'
 * detectNamingConvention('FirstName')  → 'PascalCase'
 * detectNamingConvention('name')       → 'unknown'
 */
export function detectNamingConvention(name: string): NamingConvention {
    if (name.includes('_')) {
        return name === name.toUpperCase() && /[A-Z]/.test(name) ? 'SCREAMING_SNAKE_CASE' : 'snake_case';
    }
    if (/^[A-Z]/.test(name)) return 'PascalCase';
    if (/[A-Z]/.test(name)) return 'camelCase';
    return 'unknown';
}
