/**
 * ShapeDescriptors — Declarative Request/Response Data Shapes
 *
 * A shape is a named, introspectable description of a payload's fields.
 * Fields form a closed tagged union on `kind`, so every consumer can
 * switch over it exhaustively:
 *
 * | kind        | meaning                                          |
 * |-------------|--------------------------------------------------|
 * | `primitive` | scalar value, validated by a Zod schema          |
 * | `list`      | homogeneous list of a child field                |
 * | `nested`    | another shape (or many of them)                  |
 * | `hidden`    | server-populated, never documented as input      |
 * | `dict`      | free-form mapping, not introspectable            |
 * | `json`      | free-form JSON blob, not introspectable          |
 *
 * Any kind may additionally be `readOnly`.
 *
 * @example
 * ```typescript
 * const Owner = defineShape('Owner', {
 *     fields: {
 *         id:   field.integer({ readOnly: true }),
 *         name: field.string({ max: 100, helpText: 'Display name' }),
 *     },
 * });
 *
 * const Pet = defineShape('Pet', {
 *     doc: 'A pet in the store.',
 *     fields: {
 *         name:  field.string(),
 *         tags:  field.list(field.string()),
 *         owner: field.nested(Owner, { helpText: 'Current owner' }),
 *         extra: field.json({ required: false }),
 *     },
 *     errorStatusCodes: { 404: 'Pet not found' },
 * });
 * ```
 *
 * @module
 */
import { z, type ZodTypeAny } from 'zod';

// ============================================================================
// Field Types
// ============================================================================

/** Help text, either eager or lazily resolved (e.g. a translation lookup) */
export type Localizable = string | (() => string);

/** Options shared by every field builder */
export interface FieldOptions {
    readonly label?: string;
    readonly helpText?: Localizable;
    /** Defaults to `true`, or `false` for read-only fields */
    readonly required?: boolean;
    /** Defaults to `false` */
    readonly readOnly?: boolean;
}

interface FieldCommon {
    readonly label?: string;
    readonly helpText?: Localizable;
    readonly required: boolean;
    readonly readOnly: boolean;
}

export interface PrimitiveFieldDef extends FieldCommon {
    readonly kind: 'primitive';
    readonly schema: ZodTypeAny;
    /** Uploaded file content; influences request encoding */
    readonly isFile: boolean;
}

export interface ListFieldDef extends FieldCommon {
    readonly kind: 'list';
    readonly child: FieldDef;
}

export interface NestedFieldDef extends FieldCommon {
    readonly kind: 'nested';
    /** A thunk allows forward and self references */
    readonly shape: ShapeDescriptor | (() => ShapeDescriptor);
    readonly many: boolean;
}

export interface HiddenFieldDef extends FieldCommon {
    readonly kind: 'hidden';
}

export interface DictFieldDef extends FieldCommon {
    readonly kind: 'dict';
}

export interface JsonFieldDef extends FieldCommon {
    readonly kind: 'json';
}

/** An unnamed field definition, as returned by the `field` builders */
export type FieldDef =
    | PrimitiveFieldDef
    | ListFieldDef
    | NestedFieldDef
    | HiddenFieldDef
    | DictFieldDef
    | JsonFieldDef;

export type FieldKind = FieldDef['kind'];

/** A field bound to its name inside a shape */
export type ShapeField = FieldDef & { readonly name: string };

// ============================================================================
// Shape Types
// ============================================================================

export interface ShapeMeta {
    /** Declared error responses: status code → human description */
    readonly errorStatusCodes: Readonly<Record<string, string>>;
}

export interface ShapeDescriptor {
    readonly kind: 'shape';
    readonly name: string;
    readonly doc?: string;
    readonly fields: readonly ShapeField[];
    /** A list of this shape rather than a single object */
    readonly many: boolean;
    readonly meta: ShapeMeta;
}

export interface ShapeDefinition {
    readonly doc?: string;
    readonly fields: Readonly<Record<string, FieldDef>>;
    readonly errorStatusCodes?: Readonly<Record<string | number, string>>;
    readonly many?: boolean;
}

// ============================================================================
// Shape Builders
// ============================================================================

/**
 * Declare a shape. Field order follows the `fields` object.
 */
export function defineShape(name: string, definition: ShapeDefinition): ShapeDescriptor {
    const fields = Object.entries(definition.fields).map(
        ([fieldName, def]): ShapeField => Object.freeze({ ...def, name: fieldName }),
    );

    const errorStatusCodes: Record<string, string> = {};
    for (const [status, description] of Object.entries(definition.errorStatusCodes ?? {})) {
        errorStatusCodes[status] = description;
    }

    return Object.freeze({
        kind: 'shape' as const,
        name,
        ...(definition.doc !== undefined ? { doc: definition.doc } : {}),
        fields: Object.freeze(fields),
        many: definition.many ?? false,
        meta: Object.freeze({ errorStatusCodes: Object.freeze(errorStatusCodes) }),
    });
}

/** A copy of `shape` describing a list of it */
export function listOf(shape: ShapeDescriptor): ShapeDescriptor {
    return Object.freeze({ ...shape, many: true });
}

/** Unwrap a nested field's shape, calling its thunk if needed */
export function resolveNestedShape(def: NestedFieldDef): ShapeDescriptor {
    return typeof def.shape === 'function' ? def.shape() : def.shape;
}

// ============================================================================
// Field Builders
// ============================================================================

function common(options: FieldOptions = {}): FieldCommon {
    return {
        ...(options.label !== undefined ? { label: options.label } : {}),
        ...(options.helpText !== undefined ? { helpText: options.helpText } : {}),
        required: options.required ?? !options.readOnly,
        readOnly: options.readOnly ?? false,
    };
}

function primitive(schema: ZodTypeAny, options?: FieldOptions, isFile = false): PrimitiveFieldDef {
    return { kind: 'primitive', schema, isFile, ...common(options) };
}

export interface StringFieldOptions extends FieldOptions {
    readonly min?: number;
    readonly max?: number;
    readonly regex?: string;
}

export interface NumberFieldOptions extends FieldOptions {
    readonly min?: number;
    readonly max?: number;
}

export interface NestedFieldOptions extends FieldOptions {
    readonly many?: boolean;
}

/**
 * Field builders.
 *
 * Scalars are backed by Zod schemas so the generic introspector can
 * derive formats and constraints (`uri`, `date-time`, `minLength`, ...).
 */
export const field = {
    string(options: StringFieldOptions = {}): PrimitiveFieldDef {
        let s = z.string();
        if (options.min !== undefined) s = s.min(options.min);
        if (options.max !== undefined) s = s.max(options.max);
        if (options.regex !== undefined) s = s.regex(new RegExp(options.regex));
        return primitive(s, options);
    },

    integer(options: NumberFieldOptions = {}): PrimitiveFieldDef {
        let n = z.number().int();
        if (options.min !== undefined) n = n.min(options.min);
        if (options.max !== undefined) n = n.max(options.max);
        return primitive(n, options);
    },

    number(options: NumberFieldOptions = {}): PrimitiveFieldDef {
        let n = z.number();
        if (options.min !== undefined) n = n.min(options.min);
        if (options.max !== undefined) n = n.max(options.max);
        return primitive(n, options);
    },

    boolean(options?: FieldOptions): PrimitiveFieldDef {
        return primitive(z.boolean(), options);
    },

    url(options?: FieldOptions): PrimitiveFieldDef {
        return primitive(z.string().url(), options);
    },

    email(options?: FieldOptions): PrimitiveFieldDef {
        return primitive(z.string().email(), options);
    },

    uuid(options?: FieldOptions): PrimitiveFieldDef {
        return primitive(z.string().uuid(), options);
    },

    datetime(options?: FieldOptions): PrimitiveFieldDef {
        return primitive(z.string().datetime(), options);
    },

    choice<V extends string>(values: readonly [V, ...V[]], options?: FieldOptions): PrimitiveFieldDef {
        return primitive(z.enum(values), options);
    },

    file(options?: FieldOptions): PrimitiveFieldDef {
        return primitive(z.string(), options, true);
    },

    /** Escape hatch: any Zod schema */
    primitive(schema: ZodTypeAny, options?: FieldOptions): PrimitiveFieldDef {
        return primitive(schema, options);
    },

    list(child: FieldDef, options?: FieldOptions): ListFieldDef {
        return { kind: 'list', child, ...common(options) };
    },

    nested(shape: ShapeDescriptor | (() => ShapeDescriptor), options: NestedFieldOptions = {}): NestedFieldDef {
        return { kind: 'nested', shape, many: options.many ?? false, ...common(options) };
    },

    hidden(options?: FieldOptions): HiddenFieldDef {
        return { kind: 'hidden', ...common(options) };
    },

    dict(options?: FieldOptions): DictFieldDef {
        return { kind: 'dict', ...common(options) };
    },

    json(options?: FieldOptions): JsonFieldDef {
        return { kind: 'json', ...common(options) };
    },
} as const;
