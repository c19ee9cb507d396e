/**
 * ParameterExtractor — Field List → Object Schema
 *
 * Collapses `form` and `body` located fields into a single `object`
 * schema, the way a body parameter is described on the wire. Path and
 * query fields are not part of a body and are ignored.
 *
 * Pure-function module: no state, no side effects.
 */
import type { FieldDescriptor, SchemaFragment } from '../document/types.js';

/** Replaceable collaborator: returns `undefined` when nothing is extracted */
export type ParameterExtractor = (fields: readonly FieldDescriptor[]) => SchemaFragment | undefined;

const BODY_LOCATIONS = new Set(['form', 'body']);

/**
 * Default extractor.
 *
 * @returns `{ type: 'object', properties, required? }`, or `undefined`
 *          when no field travels in the body
 */
export const extractParameters: ParameterExtractor = fields => {
    const properties: Record<string, SchemaFragment> = {};
    const required: string[] = [];

    for (const field of fields) {
        if (!BODY_LOCATIONS.has(field.location)) continue;

        properties[field.name] = field.description
            ? { ...field.schema, description: field.description }
            : field.schema;
        if (field.required) required.push(field.name);
    }

    if (Object.keys(properties).length === 0) return undefined;

    return {
        type: 'object',
        properties,
        ...(required.length > 0 ? { required } : {}),
    };
};
