/**
 * LinkCompiler — Endpoint → Link
 *
 * Compiles one bound view into a {@link Link}:
 *
 *   1. Path parameters from the template (enriched by model metadata)
 *   2. Body / query parameters from the (version-resolved) request shape
 *   3. Pagination and filter query parameters
 *   4. Encoding, only when something travels in the body
 *   5. Description, augmented with versioned shape documentation
 *   6. Response schema and declared error statuses
 *   7. URL with `{version}` substituted
 *
 * Version resolution errors propagate; the caller decides what to do
 * with any other failure.
 *
 * @module
 */
import type { FieldDescriptor, Link, SchemaFragment } from './types.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { isListView } from '../routing/ActionKeys.js';
import { pathVariables, substituteVariable } from '../routing/PathTemplate.js';
import type { BoundView, HandlerMeta, HttpMethod, ModelFieldMeta, ModelMeta } from '../routing/types.js';
import { deriveRequestFields } from '../schema/FieldDeriver.js';
import type { FieldIntrospector } from '../schema/FieldIntrospector.js';
import { paginationQueryFields, wrapForPagination } from '../schema/PaginationShapes.js';
import type { ParameterExtractor } from '../schema/ParameterExtractor.js';
import { composeResponse, type ComposedResponse } from '../schema/ResponseComposer.js';
import { withAnnotations } from '../schema/SchemaUtils.js';
import type { ShapeDescriptor } from '../shape/ShapeDescriptors.js';
import { isVersioned, type ShapeRef } from '../versioning/VersionMap.js';

export interface LinkContext {
    /** Document version, substituted into `{version}` placeholders */
    readonly documentVersion: string;
    /** Version used to resolve versioned shapes */
    readonly runtimeVersion: string;
    readonly partialUpdateMethods?: readonly HttpMethod[];
    readonly introspect?: FieldIntrospector;
    readonly extractParameters?: ParameterExtractor;
    readonly debug?: DebugObserverFn;
}

const BODY_METHODS: ReadonlySet<HttpMethod> = new Set(['POST', 'PUT', 'PATCH']);
const FILTERED_ACTIONS: ReadonlySet<string> = new Set(['list', 'retrieve', 'update', 'partial_update', 'destroy']);
const FILTERED_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'PUT', 'PATCH', 'DELETE']);
const DEFAULT_ENCODING = 'application/json';
const MULTIPART = 'multipart/form-data';

const NO_RESPONSE: ComposedResponse = { response: {}, errorStatusCodes: {} };

// ── Public API ───────────────────────────────────────────

/**
 * Compile a single endpoint.
 *
 * @param path - Path template of the route (not prefix-stripped)
 * @param view - View bound to the endpoint's method and request
 * @throws {VersionParseError | NoMatchingVersionError} From shape resolution
 */
export function compileLink(path: string, view: BoundView, context: LinkContext): Link {
    const definition = view.definition;
    const methodName = view.action ?? view.method.toLowerCase();
    const handler: HandlerMeta | undefined = definition.handlers?.[methodName];
    const resolve = (ref: ShapeRef, role: 'request' | 'response'): ShapeDescriptor =>
        resolveShape(ref, role, path, view, context);

    // ── Parameters ──
    const requestRef = handler?.requestShape ?? definition.serializer;
    const requestShape = requestRef !== undefined ? resolve(requestRef, 'request') : undefined;

    const fields: FieldDescriptor[] = [
        ...getPathFields(path, view),
        ...(requestShape !== undefined
            ? deriveRequestFields(requestShape, {
                method: view.method,
                ...(context.partialUpdateMethods !== undefined
                    ? { partialUpdateMethods: context.partialUpdateMethods } : {}),
                ...(context.introspect !== undefined ? { introspect: context.introspect } : {}),
            })
            : []),
        ...getPaginationFields(path, view),
        ...getFilterFields(view),
    ];

    const hasBody = fields.some(f => f.location === 'form' || f.location === 'body');
    const encoding = hasBody ? getEncoding(view, requestShape) : undefined;

    // ── Description ──
    let description = handler?.description ?? definition.description ?? '';

    const requestDoc = requestRef !== undefined && isVersioned(requestRef) ? shapeDoc(requestRef.doc) : '';
    if (requestDoc) {
        description += `\n\n**Request Description:**\n${requestDoc}`;
    }

    // ── Response ──
    let responseShape: ShapeDescriptor | undefined;
    const responseRef = handler?.responseShape;
    if (responseRef !== undefined) {
        if (isVersioned(responseRef)) {
            const responseDoc = shapeDoc(responseRef.doc);
            if (responseDoc) {
                description += `\n\n**Response Description:**\n${responseDoc}`;
            }
        }
        responseShape = resolve(responseRef, 'response');
    } else if ((methodName === 'list' || methodName === 'retrieve') && definition.serializer !== undefined) {
        responseShape = resolve(definition.serializer, 'response');
        if (methodName === 'list') {
            responseShape = wrapForPagination(responseShape, definition.pagination);
        }
    }

    const { response, errorStatusCodes } = responseShape !== undefined
        ? composeResponse(responseShape, handler?.doc, {
            ...(context.introspect !== undefined ? { introspect: context.introspect } : {}),
            ...(context.extractParameters !== undefined ? { extractParameters: context.extractParameters } : {}),
        })
        : NO_RESPONSE;

    return Object.freeze({
        kind: 'link' as const,
        url: substituteVariable(path, 'version', context.documentVersion),
        action: view.method.toLowerCase(),
        ...(encoding !== undefined ? { encoding } : {}),
        description,
        fields: Object.freeze(fields),
        responseSchema: response,
        errorStatusCodes,
    });
}

/**
 * Required `path` parameters for every template variable except `version`.
 */
export function getPathFields(path: string, view: BoundView): FieldDescriptor[] {
    const { model, lookupField, lookupValueRegex } = view.definition;
    const fields: FieldDescriptor[] = [];

    for (const variable of pathVariables(path)) {
        if (variable === 'version') continue;

        const modelField = model?.fields[variable];
        let title: string | undefined;
        let description: string | undefined;
        if (model !== undefined && modelField !== undefined) {
            title = modelField.verboseName;
            if (modelField.helpText) {
                description = modelField.helpText;
            } else if (modelField.primaryKey) {
                description = pkDescription(model, modelField);
            }
        }

        let schema: SchemaFragment = { type: 'string' };
        if (lookupValueRegex !== undefined && lookupField === variable) {
            schema = { type: 'string', pattern: lookupValueRegex };
        } else if (modelField?.type === 'auto') {
            schema = { type: 'integer' };
        }

        fields.push(Object.freeze({
            name: variable,
            location: 'path',
            required: true,
            schema: withAnnotations(schema, title, description),
        }));
    }
    return fields;
}

/** Description of a primary key lacking help text */
export function pkDescription(model: ModelMeta, field: ModelFieldMeta): string {
    const valueType = field.type === 'auto'
        ? 'unique integer value'
        : field.type === 'uuid' ? 'UUID string' : 'unique value';
    return `A ${valueType} identifying this ${model.verboseName ?? model.name}.`;
}

/** Strip every line of a shape's documentation */
export function shapeDoc(doc: string | undefined): string {
    if (doc === undefined) return '';
    return doc.split(/\r?\n/).map(line => line.trim()).join('\n');
}

// ── Internal ─────────────────────────────────────────────

function resolveShape(
    ref: ShapeRef,
    role: 'request' | 'response',
    path: string,
    view: BoundView,
    context: LinkContext,
): ShapeDescriptor {
    if (!isVersioned(ref)) return ref;

    const entry = ref.match(context.runtimeVersion);
    context.debug?.({
        type: 'version',
        path,
        method: view.method,
        role,
        requestedVersion: context.runtimeVersion,
        constraint: entry.constraint.source,
        shape: entry.shape.name,
        timestamp: Date.now(),
    });
    return entry.shape;
}

function getPaginationFields(path: string, view: BoundView): FieldDescriptor[] {
    if (!isListView(path, view)) return [];
    return paginationQueryFields(view.definition.pagination);
}

function getFilterFields(view: BoundView): FieldDescriptor[] {
    const backends = view.definition.filterBackends;
    if (backends === undefined || backends.length === 0) return [];

    const allowed = view.action !== undefined
        ? FILTERED_ACTIONS.has(view.action)
        : FILTERED_METHODS.has(view.method);
    if (!allowed) return [];

    return backends.flatMap(backend => [...backend.getSchemaFields(view)]);
}

function getEncoding(view: BoundView, requestShape: ShapeDescriptor | undefined): string | undefined {
    if (!BODY_METHODS.has(view.method)) return undefined;

    const parsers = view.definition.parsers ?? [DEFAULT_ENCODING];
    const hasFile = requestShape?.fields.some(f => f.kind === 'primitive' && f.isFile) ?? false;
    if (hasFile && parsers.includes(MULTIPART)) return MULTIPART;

    return parsers[0] ?? DEFAULT_ENCODING;
}
