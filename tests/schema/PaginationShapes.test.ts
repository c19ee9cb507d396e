import { describe, it, expect } from 'vitest';
import {
    wrapForPagination, paginationQueryFields, resolvePaginationStrategy,
} from '../../src/schema/PaginationShapes.js';
import { composeResponse } from '../../src/schema/ResponseComposer.js';
import { defineShape, field } from '../../src/shape/ShapeDescriptors.js';

// ============================================================================
// PaginationShapes Tests
// ============================================================================

// ── Helpers ──

const Pet = defineShape('Pet', { fields: { name: field.string() } });

function fieldNames(strategy?: Parameters<typeof wrapForPagination>[1]): string[] {
    return wrapForPagination(Pet, strategy).fields.map(f => f.name);
}

describe('PaginationShapes', () => {
    // ── Shapes ──

    describe('wrapForPagination()', () => {
        it('should add count and links for page-number pagination', () => {
            expect(fieldNames({ kind: 'page-number' })).toEqual(['results', 'next', 'previous', 'count']);
        });

        it('should add count and links for limit-offset pagination', () => {
            expect(fieldNames({ kind: 'limit-offset' })).toEqual(['results', 'next', 'previous', 'count']);
        });

        it('should add links only for cursor pagination', () => {
            expect(fieldNames({ kind: 'cursor' })).toEqual(['results', 'next', 'previous']);
        });

        it('should keep results only without a known paginator', () => {
            expect(fieldNames()).toEqual(['results']);
            expect(fieldNames({ kind: 'custom', name: 'KeysetPager' })).toEqual(['results']);
        });

        it('should follow a proxy to its default pager', () => {
            expect(fieldNames({ kind: 'proxy', defaultPager: { kind: 'cursor' } }))
                .toEqual(['results', 'next', 'previous']);
        });

        it('should name the envelope after the item shape', () => {
            const wrapped = wrapForPagination(Pet);
            expect(wrapped.name).toBe('PaginatedPet');
            const [results] = wrapped.fields;
            expect(results?.kind).toBe('nested');
            if (results?.kind === 'nested') {
                expect(results.many).toBe(true);
                expect(results.shape).toBe(Pet);
            }
        });

        it('should compose into the documented envelope', () => {
            const { response } = composeResponse(wrapForPagination(Pet, { kind: 'page-number' }));
            expect(response.schema).toEqual({
                type: 'object',
                properties: {
                    results: {
                        type: 'array',
                        items: { type: 'object', properties: { name: { type: 'string' } } },
                    },
                    next: { type: 'string', format: 'uri' },
                    previous: { type: 'string', format: 'uri' },
                    count: { type: 'integer' },
                },
                required: ['results', 'next', 'previous', 'count'],
            });
        });
    });

    // ── Query fields ──

    describe('paginationQueryFields()', () => {
        it('should describe the page parameter', () => {
            expect(paginationQueryFields({ kind: 'page-number' })).toEqual([{
                name: 'page',
                location: 'query',
                required: false,
                schema: {
                    type: 'integer',
                    title: 'Page',
                    description: 'A page number within the paginated result set.',
                },
            }]);
        });

        it('should add the page size parameter when configured', () => {
            const fields = paginationQueryFields({ kind: 'page-number', pageQueryParam: 'p', pageSizeQueryParam: 'size' });
            expect(fields.map(f => f.name)).toEqual(['p', 'size']);
            expect(fields[1]?.schema.description).toBe('Number of results to return per page.');
        });

        it('should describe limit and offset', () => {
            const fields = paginationQueryFields({ kind: 'limit-offset', limitQueryParam: 'take' });
            expect(fields.map(f => f.name)).toEqual(['take', 'offset']);
            expect(fields[1]?.schema).toEqual({
                type: 'integer',
                title: 'Offset',
                description: 'The initial index from which to return the results.',
            });
        });

        it('should describe the cursor as a string', () => {
            expect(paginationQueryFields({ kind: 'cursor' })).toEqual([{
                name: 'cursor',
                location: 'query',
                required: false,
                schema: { type: 'string', title: 'Cursor', description: 'The pagination cursor value.' },
            }]);
        });

        it('should be empty without a known paginator', () => {
            expect(paginationQueryFields(undefined)).toEqual([]);
            expect(paginationQueryFields({ kind: 'custom', name: 'KeysetPager' })).toEqual([]);
        });
    });

    describe('resolvePaginationStrategy()', () => {
        it('should resolve a single proxy level', () => {
            expect(resolvePaginationStrategy({ kind: 'proxy', defaultPager: { kind: 'page-number' } }))
                .toEqual({ kind: 'page-number' });
            expect(resolvePaginationStrategy(undefined)).toBeUndefined();
        });
    });
});
