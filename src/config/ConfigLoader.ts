/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `shapedoc.yaml` from cwd or a specified path, validates the
 * structure, and merges with defaults.
 *
 * @module
 */
import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { mergeConfig, type GeneratorConfig, type PartialConfig } from './GeneratorConfig.js';

// ── Filename Conventions ─────────────────────────────────

const CONFIG_FILENAMES = [
    'shapedoc.yaml',
    'shapedoc.yml',
    'shapedoc.json',
];

// ── File Schema ──────────────────────────────────────────

const HttpMethodSchema = z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']);

const ConfigFileSchema = z.object({
    // YAML reads `version: 1.0` as a number
    version: z.union([z.string(), z.number()]).transform(String).optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    url: z.string().url().optional(),
    coercePathPk: z.boolean().optional(),
    partialUpdateMethods: z.array(HttpMethodSchema).optional(),
}).strict();

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `shapedoc.yaml` in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @returns Fully merged GeneratorConfig
 */
export function loadConfig(configPath?: string, cwd?: string): GeneratorConfig {
    const workDir = cwd ?? process.cwd();

    // 1. Explicit path
    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new Error(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    // 2. Auto-detect
    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    // 3. All defaults
    return mergeConfig({});
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): GeneratorConfig {
    const content = readFileSync(filePath, 'utf-8');
    const raw: unknown = filePath.endsWith('.json')
        ? JSON.parse(content)
        : parseYaml(content);

    const result = ConfigFileSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `  • ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('\n');
        throw new Error(`Invalid config file "${filePath}":\n${issues}`, { cause: result.error });
    }

    const partial: PartialConfig = {
        ...(result.data.version !== undefined ? { version: result.data.version } : {}),
        ...(result.data.title !== undefined ? { title: result.data.title } : {}),
        ...(result.data.description !== undefined ? { description: result.data.description } : {}),
        ...(result.data.url !== undefined ? { url: result.data.url } : {}),
        ...(result.data.coercePathPk !== undefined ? { coercePathPk: result.data.coercePathPk } : {}),
        ...(result.data.partialUpdateMethods !== undefined
            ? { partialUpdateMethods: result.data.partialUpdateMethods } : {}),
    };
    return mergeConfig(partial);
}
