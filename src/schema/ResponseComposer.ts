/**
 * ResponseComposer — Response Shape → Response Schema
 *
 * Walks a response shape depth-first:
 *
 * - single nested shapes are composed recursively and spliced into the
 *   parent's `properties`, carrying the nested field's own help text;
 * - every other field (read-only included) is derived through the
 *   fallback-or-introspect path and collapsed by the parameter extractor.
 *
 * Nested entries are merged last and win a name collision with a flat
 * entry. Only the outermost call receives the response-level description.
 *
 * @example
 * ```typescript
 * const { response, errorStatusCodes } = composeResponse(PetShape, 'The pet.');
 * response.schema?.properties?.owner; // { type: 'object', properties: {...}, description: 'Current owner' }
 * errorStatusCodes['404'];            // { description: 'Pet not found' }
 * ```
 *
 * @module
 */
import type {
    ErrorStatus, ErrorStatusMap, FieldDescriptor, ResponseSchema, SchemaFragment,
} from '../document/types.js';
import { resolveNestedShape, type ShapeDescriptor } from '../shape/ShapeDescriptors.js';
import { schemaForField } from './FieldDeriver.js';
import { enterShape, type FieldIntrospector } from './FieldIntrospector.js';
import { extractParameters, type ParameterExtractor } from './ParameterExtractor.js';
import { resolveText } from './SchemaUtils.js';

export interface ComposeOptions {
    readonly introspect?: FieldIntrospector;
    readonly extractParameters?: ParameterExtractor;
}

export interface ComposedResponse {
    readonly response: ResponseSchema;
    readonly errorStatusCodes: ErrorStatusMap;
}

/** The declared empty-response case */
const EMPTY: ComposedResponse = Object.freeze({
    response: Object.freeze({}),
    errorStatusCodes: Object.freeze({}),
});

// ── Public API ───────────────────────────────────────────

/**
 * Compose the success response schema and the declared error statuses.
 *
 * @param shape - Response shape
 * @param description - Response-level description (outermost call only)
 * @throws {CyclicDescriptorError} When nested shapes reference themselves
 */
export function composeResponse(
    shape: ShapeDescriptor,
    description?: string,
    options: ComposeOptions = {},
): ComposedResponse {
    return compose(shape, description, options, []);
}

/** Declared error statuses of a shape: status → `{ description }` */
export function collectErrorStatusCodes(shape: ShapeDescriptor): ErrorStatusMap {
    const codes: Record<string, ErrorStatus> = {};
    for (const [status, description] of Object.entries(shape.meta.errorStatusCodes)) {
        codes[status] = { description };
    }
    return codes;
}

// ── Internal ─────────────────────────────────────────────

function compose(
    shape: ShapeDescriptor,
    description: string | undefined,
    options: ComposeOptions,
    trail: readonly ShapeDescriptor[],
): ComposedResponse {
    const path = enterShape(shape, trail);
    const flat: FieldDescriptor[] = [];
    const nestedObjects: Record<string, SchemaFragment> = {};

    for (const declared of shape.fields) {
        if (declared.kind === 'nested' && !declared.many) {
            const sub = resolveNestedShape(declared);
            const subSchema = sub.many
                ? undefined
                : compose(sub, undefined, options, path).response.schema;

            if (subSchema !== undefined) {
                const fieldDescription = resolveText(declared.helpText);
                nestedObjects[declared.name] = fieldDescription !== undefined
                    ? { ...subSchema, description: fieldDescription }
                    : subSchema;
                continue;
            }
        }

        flat.push({
            name: declared.name,
            location: 'form',
            required: declared.required,
            schema: schemaForField(declared, options.introspect),
        });
    }

    const extracted = (options.extractParameters ?? extractParameters)(flat);
    if (extracted === undefined && Object.keys(nestedObjects).length === 0) {
        return EMPTY;
    }

    const base: SchemaFragment = extracted ?? { type: 'object', properties: {} };
    const object: SchemaFragment = {
        ...base,
        properties: { ...(base.properties ?? {}), ...nestedObjects },
    };
    const schema: SchemaFragment = shape.many ? { type: 'array', items: object } : object;

    return {
        response: {
            ...(description !== undefined ? { description } : {}),
            schema,
        },
        errorStatusCodes: collectErrorStatusCodes(shape),
    };
}
