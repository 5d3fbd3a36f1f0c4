import { describe, it, expect } from 'vitest';
import {
    detectNamingConvention, toCamelCase, toPascalCase, toSnakeCase,
} from '../../src/naming/CaseConverter.js';

// ============================================================================
// CaseConverter Tests
// ============================================================================

describe('CaseConverter', () => {
    describe('toSnakeCase()', () => {
        it('should split camelCase and PascalCase words', () => {
            expect(toSnakeCase('getPetById')).toBe('get_pet_by_id');
            expect(toSnakeCase('PetStore')).toBe('pet_store');
        });

        it('should keep acronyms together', () => {
            expect(toSnakeCase('HTTPResponse')).toBe('http_response');
        });

        it('should replace spaces and hyphens', () => {
            expect(toSnakeCase('my-kebab case')).toBe('my_kebab_case');
        });

        it('should collapse and trim underscores', () => {
            expect(toSnakeCase('__x__y_')).toBe('x_y');
        });
    });

    describe('toPascalCase()', () => {
        it('should join separated words', () => {
            expect(toPascalCase('user-account')).toBe('UserAccount');
            expect(toPascalCase('find_pets')).toBe('FindPets');
            expect(toPascalCase('pet')).toBe('Pet');
        });

        it('should lower-case the rest of each word', () => {
            expect(toPascalCase('myClass')).toBe('Myclass');
        });
    });

    describe('toCamelCase()', () => {
        it('should lower-case the first letter', () => {
            expect(toCamelCase('pet_store')).toBe('petStore');
            expect(toCamelCase('user-name')).toBe('userName');
            expect(toCamelCase('')).toBe('');
        });
    });

    describe('detectNamingConvention()', () => {
        it('should classify identifiers', () => {
            expect(detectNamingConvention('first_name')).toBe('snake_case');
            expect(detectNamingConvention('MAX_SIZE')).toBe('SCREAMING_SNAKE_CASE');
            expect(detectNamingConvention('firstName')).toBe('camelCase');
            expect(detectNamingConvention('FirstName')).toBe('PascalCase');
        });

        it('should return unknown for single lower-case words', () => {
            expect(detectNamingConvention('name')).toBe('unknown');
            expect(detectNamingConvention('')).toBe('unknown');
        });
    });
});
