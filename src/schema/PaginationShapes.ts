/**
 * PaginationShapes — Paginated Response Shapes & Query Fields
 *
 * List endpoints return their items wrapped by the paginator. This module
 * synthesizes the wrapping shape so the response schema documents what
 * is actually sent:
 *
 * | strategy                    | fields                              |
 * |-----------------------------|-------------------------------------|
 * | page-number / limit-offset  | `results`, `next`, `previous`, `count` |
 * | cursor                      | `results`, `next`, `previous`       |
 * | none / custom               | `results`                           |
 *
 * A `proxy` strategy is resolved once through its `defaultPager`
 * before classification.
 *
 * @module
 */
import type { FieldDescriptor } from '../document/types.js';
import { defineShape, field, type FieldDef, type ShapeDescriptor } from '../shape/ShapeDescriptors.js';

// ── Strategies ───────────────────────────────────────────

export interface PageNumberPagination {
    readonly kind: 'page-number';
    /** Defaults to `page` */
    readonly pageQueryParam?: string;
    /** When set, clients may choose the page size */
    readonly pageSizeQueryParam?: string;
}

export interface LimitOffsetPagination {
    readonly kind: 'limit-offset';
    readonly limitQueryParam?: string;
    readonly offsetQueryParam?: string;
}

export interface CursorPagination {
    readonly kind: 'cursor';
    readonly cursorQueryParam?: string;
}

/** Delegates to a concrete paginator */
export interface ProxyPagination {
    readonly kind: 'proxy';
    readonly defaultPager: PaginationStrategy;
}

/** Any paginator this module does not know how to describe */
export interface CustomPagination {
    readonly kind: 'custom';
    readonly name: string;
}

export type PaginationStrategy =
    | PageNumberPagination
    | LimitOffsetPagination
    | CursorPagination
    | ProxyPagination
    | CustomPagination;

/** Follow a proxy strategy one level */
export function resolvePaginationStrategy(
    strategy: PaginationStrategy | undefined,
): PaginationStrategy | undefined {
    return strategy?.kind === 'proxy' ? strategy.defaultPager : strategy;
}

// ── Shape Synthesis ──────────────────────────────────────

/**
 * Wrap a child shape in the response envelope of a paginator.
 *
 * @param child - Shape of a single list item
 * @param strategy - The route's paginator, if any
 */
export function wrapForPagination(
    child: ShapeDescriptor,
    strategy?: PaginationStrategy,
): ShapeDescriptor {
    const fields: Record<string, FieldDef> = {
        results: field.nested(child, { many: true }),
    };

    const pager = resolvePaginationStrategy(strategy);
    switch (pager?.kind) {
        case 'page-number':
        case 'limit-offset':
            fields['next'] = field.url();
            fields['previous'] = field.url();
            fields['count'] = field.integer();
            break;
        case 'cursor':
            fields['next'] = field.url();
            fields['previous'] = field.url();
            break;
        default:
            break;
    }

    return defineShape(`Paginated${child.name}`, { fields });
}

// ── Query Fields ─────────────────────────────────────────

function queryField(name: string, title: string, description: string, type: 'integer' | 'string'): FieldDescriptor {
    return Object.freeze({
        name,
        location: 'query',
        required: false,
        schema: { type, title, description },
    });
}

/**
 * Query parameters accepted by a paginated list endpoint.
 */
export function paginationQueryFields(strategy: PaginationStrategy | undefined): FieldDescriptor[] {
    const pager = resolvePaginationStrategy(strategy);
    switch (pager?.kind) {
        case 'page-number': {
            const fields = [queryField(
                pager.pageQueryParam ?? 'page', 'Page',
                'A page number within the paginated result set.', 'integer',
            )];
            if (pager.pageSizeQueryParam) {
                fields.push(queryField(
                    pager.pageSizeQueryParam, 'Page size',
                    'Number of results to return per page.', 'integer',
                ));
            }
            return fields;
        }
        case 'limit-offset':
            return [
                queryField(pager.limitQueryParam ?? 'limit', 'Limit',
                    'Number of results to return per page.', 'integer'),
                queryField(pager.offsetQueryParam ?? 'offset', 'Offset',
                    'The initial index from which to return the results.', 'integer'),
            ];
        case 'cursor':
            return [queryField(pager.cursorQueryParam ?? 'cursor', 'Cursor',
                'The pagination cursor value.', 'string')];
        default:
            return [];
    }
}
