/**
 * FieldDeriver — Declared Field → Request Parameter
 *
 * Rules, in order:
 *   1. Read-only and hidden fields are never request input: omitted.
 *   2. `required` holds only when declared AND the method is not a
 *      partial update (`PATCH` by default).
 *   3. Lazy help text is forced to a string.
 *   4. `dict` / `json` fields take the fallback `object` schema; every
 *      other kind goes through the generic introspector.
 *
 * Pure-function module: no state, no side effects.
 */
import type { FieldDescriptor, FieldLocation, SchemaFragment } from '../document/types.js';
import type { HttpMethod } from '../routing/types.js';
import type { ShapeDescriptor, ShapeField } from '../shape/ShapeDescriptors.js';
import { fallbackSchema, introspectField, type FieldIntrospector } from './FieldIntrospector.js';
import { resolveText } from './SchemaUtils.js';

export const DEFAULT_PARTIAL_UPDATE_METHODS: readonly HttpMethod[] = ['PATCH'];

const MUTATING_METHODS: ReadonlySet<HttpMethod> = new Set(['POST', 'PUT', 'PATCH']);

export interface DeriveContext {
    readonly method: HttpMethod;
    /** Methods under which no field is required */
    readonly partialUpdateMethods?: readonly HttpMethod[];
    readonly introspect?: FieldIntrospector;
}

// ── Public API ───────────────────────────────────────────

/** Fallback schema when one applies, otherwise the introspected one */
export function schemaForField(
    field: ShapeField,
    introspect: FieldIntrospector = introspectField,
): SchemaFragment {
    return fallbackSchema(field) ?? introspect(field);
}

/**
 * Derive one request parameter.
 *
 * @returns `undefined` for read-only and hidden fields
 */
export function deriveField(
    field: ShapeField,
    location: FieldLocation,
    context: DeriveContext,
): FieldDescriptor | undefined {
    if (field.readOnly || field.kind === 'hidden') return undefined;

    const partial = (context.partialUpdateMethods ?? DEFAULT_PARTIAL_UPDATE_METHODS)
        .includes(context.method);
    const description = resolveText(field.helpText);

    return Object.freeze({
        name: field.name,
        location,
        required: field.required && !partial,
        schema: schemaForField(field, context.introspect),
        ...(description !== undefined ? { description } : {}),
    });
}

/** `form` for methods that carry a body, `query` otherwise */
export function requestLocation(method: HttpMethod): FieldLocation {
    return MUTATING_METHODS.has(method) ? 'form' : 'query';
}

/**
 * Derive the request parameters of a whole shape.
 *
 * A list shape (`many`) is documented as a single required `data` array.
 */
export function deriveRequestFields(
    shape: ShapeDescriptor,
    context: DeriveContext,
): FieldDescriptor[] {
    const location = requestLocation(context.method);

    if (shape.many) {
        return [Object.freeze({
            name: 'data',
            location,
            required: true,
            schema: { type: 'array' },
        })];
    }

    const fields: FieldDescriptor[] = [];
    for (const declared of shape.fields) {
        const derived = deriveField(declared, location, context);
        if (derived) fields.push(derived);
    }
    return fields;
}
