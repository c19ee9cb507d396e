/**
 * FieldIntrospector — Generic Field → Schema Conversion
 *
 * Turns one declared field into a basic schema fragment:
 *
 * - `primitive` → the field's Zod schema through `zod-to-json-schema`
 * - `list`      → `array` of the child field
 * - `nested`    → `object` with every field of the nested shape
 *                 (`array` of it when `many`)
 * - `hidden`, `dict`, `json` → `string`
 *
 * Free-form mappings have no declared structure. The field deriver
 * replaces them with a generic `object` (see {@link fallbackSchema}).
 *
 * Pure-function module: no state, no side effects.
 */
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { SchemaFragment } from '../document/types.js';
import {
    resolveNestedShape,
    type FieldDef, type ShapeDescriptor,
} from '../shape/ShapeDescriptors.js';
import { CyclicDescriptorError } from './CyclicDescriptorError.js';
import { resolveText, toSchemaFragment, withAnnotations } from './SchemaUtils.js';

/** Replaceable collaborator: converts a single field to a schema */
export type FieldIntrospector = (field: FieldDef) => SchemaFragment;

// ── Public API ───────────────────────────────────────────

/**
 * Default introspector.
 *
 * @throws {CyclicDescriptorError} When nested shapes reference themselves
 */
export const introspectField: FieldIntrospector = field => introspect(field, []);

/**
 * Fallback schema for field kinds the generic introspector cannot
 * represent: free-form `dict` and `json` fields become an `object` with
 * empty `properties`. Returns `undefined` for every other kind.
 */
export function fallbackSchema(field: FieldDef): SchemaFragment | undefined {
    switch (field.kind) {
        case 'dict':
        case 'json':
            return withAnnotations(
                { type: 'object', properties: {} },
                field.label,
                resolveText(field.helpText),
            );
        default:
            return undefined;
    }
}

/**
 * Guard against re-entering a shape already on the current path.
 *
 * @throws {CyclicDescriptorError}
 */
export function enterShape(
    shape: ShapeDescriptor,
    trail: readonly ShapeDescriptor[],
): readonly ShapeDescriptor[] {
    if (trail.includes(shape)) {
        throw new CyclicDescriptorError([...trail, shape].map(s => s.name));
    }
    return [...trail, shape];
}

// ── Internal ─────────────────────────────────────────────

function introspect(field: FieldDef, trail: readonly ShapeDescriptor[]): SchemaFragment {
    return withAnnotations(baseSchema(field, trail), field.label, resolveText(field.helpText));
}

function baseSchema(field: FieldDef, trail: readonly ShapeDescriptor[]): SchemaFragment {
    switch (field.kind) {
        case 'primitive':
            return toSchemaFragment(
                zodToJsonSchema(field.schema, { target: 'openApi3', $refStrategy: 'none' }),
            );

        case 'list':
            return { type: 'array', items: introspect(field.child, trail) };

        case 'nested': {
            const shape = resolveNestedShape(field);
            const object = shapeToObject(shape, enterShape(shape, trail));
            return field.many || shape.many ? { type: 'array', items: object } : object;
        }

        case 'hidden':
        case 'dict':
        case 'json':
            return { type: 'string' };
    }
}

function shapeToObject(shape: ShapeDescriptor, trail: readonly ShapeDescriptor[]): SchemaFragment {
    const properties: Record<string, SchemaFragment> = {};
    for (const child of shape.fields) {
        properties[child.name] = introspect(child, trail);
    }
    return { type: 'object', properties };
}
