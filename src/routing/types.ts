/**
 * Routing Types
 *
 * The boundary between the document generator and the web layer that
 * owns the routes. Everything here is metadata declared once at startup
 * and read-only afterwards.
 *
 * @module
 */
import type { FieldDescriptor } from '../document/types.js';
import type { PaginationStrategy } from '../schema/PaginationShapes.js';
import type { ShapeRef } from '../versioning/VersionMap.js';

// ── HTTP ─────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/** The incoming request asking for the document */
export interface RequestContext {
    /** API version negotiated for this request */
    readonly version?: string;
    /** Absolute URL of the request, used as the document URL fallback */
    readonly absoluteUrl?: string;
    readonly user?: unknown;
}

// ── Model Metadata ───────────────────────────────────────

export type ModelFieldType = 'auto' | 'uuid' | 'integer' | 'string' | 'other';

export interface ModelFieldMeta {
    readonly verboseName?: string;
    readonly helpText?: string;
    readonly primaryKey?: boolean;
    readonly type?: ModelFieldType;
}

/** Optional persistence metadata used to enrich path parameters */
export interface ModelMeta {
    readonly name: string;
    readonly verboseName?: string;
    /** Name of the primary key field (used for `{pk}` coercion) */
    readonly pkName?: string;
    readonly fields: Readonly<Record<string, ModelFieldMeta>>;
}

// ── Views ────────────────────────────────────────────────

/** Per-action handler metadata */
export interface HandlerMeta {
    /** Summary shown as the link description */
    readonly description?: string;
    /** Description of the success response */
    readonly doc?: string;
    readonly requestShape?: ShapeRef;
    readonly responseShape?: ShapeRef;
}

/** Contributes query parameters (search, ordering, ...) */
export interface FilterBackend {
    getSchemaFields(view: BoundView): readonly FieldDescriptor[];
}

/** Declarative description of a view and everything the generator reads from it */
export interface ViewDefinition {
    readonly name?: string;
    readonly description?: string;
    /** Allowed methods; `HEAD` and `OPTIONS` are never documented */
    readonly methods: readonly HttpMethod[];
    /** Action name per method (viewset-style routing) */
    readonly actions?: Readonly<Partial<Record<HttpMethod, string>>>;
    /** Handler metadata keyed by action name, or by lower-case method */
    readonly handlers?: Readonly<Record<string, HandlerMeta>>;
    /** Default shape for request bodies and list/retrieve responses */
    readonly serializer?: ShapeRef;
    readonly model?: ModelMeta;
    readonly lookupField?: string;
    readonly lookupValueRegex?: string;
    readonly pagination?: PaginationStrategy;
    readonly filterBackends?: readonly FilterBackend[];
    /** Accepted request media types, first is the default encoding */
    readonly parsers?: readonly string[];
    readonly excludeFromSchema?: boolean;
    /** Return `false` to hide the endpoint from this request */
    readonly checkPermissions?: (request: RequestContext) => boolean;
}

// ── Endpoints ────────────────────────────────────────────

/** One `(path, method, view)` triple of the route table */
export interface RouteEndpoint {
    readonly path: string;
    readonly method: HttpMethod;
    readonly view: ViewDefinition;
}

/** Supplies the endpoints to document */
export interface RouteTable {
    endpoints(): readonly RouteEndpoint[];
}

/** A view prepared for one method and request */
export interface BoundView {
    readonly definition: ViewDefinition;
    readonly method: HttpMethod;
    /** Action for this method, if the view routes by action */
    readonly action?: string;
    readonly request?: RequestContext;
}
