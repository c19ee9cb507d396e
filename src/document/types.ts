/**
 * Document Types
 *
 * Data structures produced by link compilation and tree assembly.
 * These types are the single contract between the schema derivation
 * modules, the link compiler, and whatever rendering layer consumes the
 * finished document.
 *
 * All values are created fresh per generation call and never mutated
 * after construction.
 *
 * @module
 */

// ── Schema Fragment ──────────────────────────────────────

/**
 * An OpenAPI / JSON Schema node.
 *
 * Known keywords are typed; anything else an introspector emits
 * (`minLength`, `additionalProperties`, ...) passes through untyped.
 */
export interface SchemaFragment {
    readonly type?: string;
    readonly format?: string;
    readonly title?: string;
    readonly description?: string;
    readonly pattern?: string;
    readonly enum?: readonly unknown[];
    readonly items?: SchemaFragment;
    readonly properties?: Readonly<Record<string, SchemaFragment>>;
    readonly required?: readonly string[];
    readonly [keyword: string]: unknown;
}

// ── Field Descriptor ─────────────────────────────────────

/** Where a parameter travels in the request */
export type FieldLocation = 'path' | 'query' | 'form' | 'body';

/** A single compiled endpoint parameter */
export interface FieldDescriptor {
    readonly name: string;
    readonly location: FieldLocation;
    readonly required: boolean;
    readonly schema: SchemaFragment;
    readonly description?: string;
}

// ── Response ─────────────────────────────────────────────

/**
 * Response description for the success case.
 * The empty object means the endpoint declares no response shape.
 */
export interface ResponseSchema {
    readonly description?: string;
    readonly schema?: SchemaFragment;
}

export interface ErrorStatus {
    readonly description: string;
}

/** Declared error responses keyed by status code */
export type ErrorStatusMap = Readonly<Record<string, ErrorStatus>>;

// ── Link ─────────────────────────────────────────────────

/** One compiled endpoint */
export interface Link {
    readonly kind: 'link';
    readonly url: string;
    /** Lower-case HTTP method */
    readonly action: string;
    readonly encoding?: string;
    readonly description: string;
    readonly fields: readonly FieldDescriptor[];
    readonly responseSchema: ResponseSchema;
    readonly errorStatusCodes: ErrorStatusMap;
}

// ── Tree ─────────────────────────────────────────────────

/** A tree node keyed by path segment; leaves are keyed by action */
export interface DocumentNode {
    readonly kind: 'node';
    readonly children: Readonly<Record<string, DocumentNode | Link>>;
}

/** The root of a generated document */
export interface ApiDocument {
    readonly version: string;
    readonly title?: string;
    readonly description?: string;
    readonly url?: string;
    readonly content: DocumentNode;
}

export function isLink(entry: DocumentNode | Link): entry is Link {
    return entry.kind === 'link';
}
