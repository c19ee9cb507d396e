/**
 * SchemaUtils — Schema Fragment Normalization & Helpers
 *
 * Converts loosely-typed JSON Schema output (e.g. from
 * `zod-to-json-schema`) into typed {@link SchemaFragment} nodes and
 * provides small helpers shared by the field deriver, the response
 * composer and the link compiler.
 *
 * Used by: FieldIntrospector, FieldDeriver, ResponseComposer, LinkCompiler.
 *
 * Pure-function module: no state, no side effects.
 */
import type { SchemaFragment } from '../document/types.js';
import type { Localizable } from '../shape/ShapeDescriptors.js';

interface MutableFragment {
    type?: string;
    format?: string;
    title?: string;
    description?: string;
    pattern?: string;
    enum?: unknown[];
    items?: SchemaFragment;
    properties?: Record<string, SchemaFragment>;
    required?: string[];
    [keyword: string]: unknown;
}

const STRING_KEYWORDS: ReadonlySet<string> = new Set(['type', 'format', 'title', 'description', 'pattern']);

/** Keywords that only make sense inside a standalone JSON Schema document */
const DOCUMENT_KEYWORDS: ReadonlySet<string> = new Set(['$schema', 'definitions', '$defs']);

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Normalization ────────────────────────────────────────

/**
 * Narrow an arbitrary JSON Schema value to a {@link SchemaFragment}.
 *
 * Known keywords with an unexpected value type are dropped; unknown
 * keywords pass through untouched. Non-object input yields `{}`.
 */
export function toSchemaFragment(value: unknown): SchemaFragment {
    if (!isRecord(value)) return {};

    const fragment: MutableFragment = {};
    for (const [key, entry] of Object.entries(value)) {
        if (DOCUMENT_KEYWORDS.has(key)) continue;

        if (STRING_KEYWORDS.has(key)) {
            if (typeof entry === 'string') fragment[key] = entry;
            continue;
        }

        switch (key) {
            case 'enum':
                if (Array.isArray(entry)) fragment.enum = [...entry];
                break;
            case 'required':
                if (Array.isArray(entry)) {
                    fragment.required = entry.filter((r): r is string => typeof r === 'string');
                }
                break;
            case 'items':
                if (isRecord(entry)) fragment.items = toSchemaFragment(entry);
                break;
            case 'properties':
                if (isRecord(entry)) {
                    const properties: Record<string, SchemaFragment> = {};
                    for (const [name, prop] of Object.entries(entry)) {
                        properties[name] = toSchemaFragment(prop);
                    }
                    fragment.properties = properties;
                }
                break;
            default:
                fragment[key] = entry;
        }
    }
    return fragment;
}

// ── Helpers ──────────────────────────────────────────────

/** Force lazily-resolved help text into a concrete string */
export function resolveText(text: Localizable | undefined): string | undefined {
    if (text === undefined) return undefined;
    return typeof text === 'function' ? text() : text;
}

/**
 * Attach a title and description to a fragment.
 * Empty values are not written.
 */
export function withAnnotations(
    schema: SchemaFragment,
    title: string | undefined,
    description: string | undefined,
): SchemaFragment {
    return {
        ...schema,
        ...(title ? { title } : {}),
        ...(description ? { description } : {}),
    };
}
