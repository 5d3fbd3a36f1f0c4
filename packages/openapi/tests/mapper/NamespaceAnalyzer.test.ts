import { describe, it, expect } from 'vitest';
import {
    assignResources, detectNamespaces, extractNamespaceFromPath,
    extractNamespaceFromUrl, groupPathsByNamespace,
} from '../../src/mapper/NamespaceAnalyzer.js';
import { toOperation } from '../../src/mapper/EndpointAnalyzer.js';
import type { Namespace, Resource } from '../../src/parser/types.js';

// ── Helpers ──

function resource(name: string, ...paths: string[]): Resource {
    return {
        name,
        identifier: name,
        className: name,
        requiresId: false,
        operations: paths.map(path => toOperation({ path, method: 'GET', operation: {} })),
        methodNames: {},
        nestedGroups: {},
        nestedAccessors: {},
    };
}

// ============================================================================
// NamespaceAnalyzer Tests
// ============================================================================

describe('NamespaceAnalyzer', () => {
    describe('extractNamespaceFromPath()', () => {
        it('should detect version tokens', () => {
            expect(extractNamespaceFromPath('/v1/users')).toBe('v1');
            expect(extractNamespaceFromPath('/api/v2/products')).toBe('v2');
            expect(extractNamespaceFromPath('/users/v3')).toBe('v3');
        });

        it('should detect release stages', () => {
            expect(extractNamespaceFromPath('/beta/features')).toBe('beta');
            expect(extractNamespaceFromPath('/alpha/x')).toBe('alpha');
            expect(extractNamespaceFromPath('/canary')).toBe('canary');
            expect(extractNamespaceFromPath('/preview/x')).toBe('preview');
        });

        it('should return undefined when no token is present', () => {
            expect(extractNamespaceFromPath('/users')).toBeUndefined();
            expect(extractNamespaceFromPath('/v/users')).toBeUndefined();
            expect(extractNamespaceFromPath('/version/info')).toBeUndefined();
        });
    });

    describe('extractNamespaceFromUrl()', () => {
        it('should read the token from the URL path', () => {
            expect(extractNamespaceFromUrl('https://api.example.com/v1')).toBe('v1');
            expect(extractNamespaceFromUrl('https://api.example.com/beta')).toBe('beta');
            expect(extractNamespaceFromUrl('api.example.com/api/v4')).toBe('v4');
        });

        it('should ignore the host', () => {
            expect(extractNamespaceFromUrl('https://v1.example.com')).toBeUndefined();
            expect(extractNamespaceFromUrl('https://api.example.com')).toBeUndefined();
        });
    });

    describe('detectNamespaces()', () => {
        it('should keep the first prefix of each token in path order', () => {
            const namespaces = detectNamespaces({
                paths: { '/v1/users': {}, '/api/v2/users': {}, '/v1/orders': {}, '/health': {} },
            });

            expect(namespaces).toEqual([
                { name: 'v1', pathPrefix: '/v1', source: 'path', resources: [] },
                { name: 'v2', pathPrefix: '/api/v2', source: 'path', resources: [] },
            ]);
        });

        it('should fall back to the first server URL', () => {
            expect(detectNamespaces({
                paths: { '/users': {} },
                servers: [{ url: 'https://api.example.com/api/v3/' }, { url: 'https://api.example.com/v9' }],
            })).toEqual([{ name: 'v3', pathPrefix: '/api/v3', source: 'server', resources: [] }]);
        });

        it('should not skip past a first server without a URL', () => {
            expect(detectNamespaces({
                paths: { '/users': {} },
                servers: [{ description: 'Sandbox' }, { url: 'https://api.example.com/v9' }],
            })).toEqual([]);
        });

        it('should return no namespaces when nothing is versioned', () => {
            expect(detectNamespaces({ paths: { '/users': {} }, servers: [{ url: 'https://api.example.com' }] })).toEqual([]);
            expect(detectNamespaces({})).toEqual([]);
        });
    });

    describe('groupPathsByNamespace()', () => {
        it('should put unversioned paths under "default"', () => {
            const grouped = groupPathsByNamespace(['/v1/a', '/b', '/v2/c', '/v1/d']);

            expect([...grouped.entries()]).toEqual([
                ['v1', ['/v1/a', '/v1/d']],
                ['default', ['/b']],
                ['v2', ['/v2/c']],
            ]);
        });
    });

    describe('assignResources()', () => {
        const users = resource('users', '/v1/users', '/v2/users');
        const orders = resource('orders', '/v1/orders');
        const legacy = resource('legacy', '/v10/items');

        it('should attach resources by path prefix', () => {
            const namespaces: Namespace[] = [
                { name: 'v1', pathPrefix: '/v1', source: 'path', resources: [] },
                { name: 'v2', pathPrefix: '/v2', source: 'path', resources: [] },
            ];
            const [v1, v2] = assignResources(namespaces, [users, orders, legacy]);

            expect(v1?.resources.map(r => r.name)).toEqual(['users', 'orders']);
            expect(v2?.resources.map(r => r.name)).toEqual(['users']);
        });

        it('should give a server namespace every resource', () => {
            const [server] = assignResources(
                [{ name: 'v1', pathPrefix: '/v1', source: 'server', resources: [] }],
                [users, legacy],
            );

            expect(server?.resources).toEqual([users, legacy]);
        });
    });
});
