/**
 * GeneratorConfig — Document Generator Configuration
 *
 * Controls the document header (title, description, version, base URL)
 * and the few generation rules that are deployment-specific.
 *
 * Can be loaded from a YAML file (`shapedoc.yaml`) or passed programmatically.
 *
 * @module
 */
import type { HttpMethod } from '../routing/types.js';

// ── Full Config ──────────────────────────────────────────

/**
 * Complete generator configuration.
 *
 * All fields have defaults; see {@link DEFAULT_CONFIG}.
 */
export interface GeneratorConfig {
    /** Document version, also substituted into `{version}` URL placeholders */
    readonly version: string;
    readonly title?: string;
    readonly description?: string;
    /** Base URL; falls back to the request's absolute URL */
    readonly url?: string;
    /** Rename `{pk}` path variables after the model's primary key */
    readonly coercePathPk: boolean;
    /** Methods under which no request field is required */
    readonly partialUpdateMethods: readonly HttpMethod[];
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: GeneratorConfig = {
    version: '1.0',
    coercePathPk: true,
    partialUpdateMethods: ['PATCH'],
};

// ── Merge Helper ─────────────────────────────────────────

/** Partial config shape for merging */
export interface PartialConfig {
    readonly version?: string;
    readonly title?: string;
    readonly description?: string;
    readonly url?: string;
    readonly coercePathPk?: boolean;
    readonly partialUpdateMethods?: readonly HttpMethod[];
}

/**
 * Merge a partial config with defaults.
 * Absent values fall back to {@link DEFAULT_CONFIG}.
 */
export function mergeConfig(partial: PartialConfig): GeneratorConfig {
    return {
        version: partial.version ?? DEFAULT_CONFIG.version,
        ...(partial.title !== undefined ? { title: partial.title } : {}),
        ...(partial.description !== undefined ? { description: partial.description } : {}),
        ...(partial.url !== undefined ? { url: partial.url } : {}),
        coercePathPk: partial.coercePathPk ?? DEFAULT_CONFIG.coercePathPk,
        partialUpdateMethods: partial.partialUpdateMethods ?? DEFAULT_CONFIG.partialUpdateMethods,
    };
}
