/**
 * PathTemplate — Path Template Utilities
 *
 * Path templates use `{name}` placeholders (`/pets/{id}/`). Everything
 * here is string manipulation over templates; no request is involved.
 *
 * Pure-function module: no state, no side effects.
 */
import type { ModelMeta } from './types.js';

const VARIABLE_PATTERN = /\{([^{}]+)\}/g;

/**
 * Template variables in order of first appearance.
 *
 * @example
 * pathVariables('/v{version}/pets/{id}/') // ['version', 'id']
 */
export function pathVariables(path: string): string[] {
    const seen = new Set<string>();
    for (const match of path.matchAll(VARIABLE_PATTERN)) {
        const name = match[1];
        if (name !== undefined) seen.add(name.trim());
    }
    return [...seen];
}

/** Path components, ignoring leading and trailing slashes */
export function pathComponents(path: string): string[] {
    const trimmed = path.replace(/^\/+|\/+$/g, '');
    return trimmed.length === 0 ? [] : trimmed.split('/');
}

/** Non-templated components: the segments used as document keys */
export function namedPathComponents(path: string): string[] {
    return pathComponents(path).filter(component => !component.includes('{'));
}

/**
 * Longest common leading run of components, as a path.
 *
 * @example
 * commonPath(['/api/users/', '/api/groups/']) // '/api'
 */
export function commonPath(paths: readonly string[]): string {
    const split = paths.map(pathComponents);
    const first = split[0] ?? [];

    let length = first.length;
    for (const components of split.slice(1)) {
        let i = 0;
        while (i < length && i < components.length && components[i] === first[i]) i++;
        length = i;
    }

    const prefix = paths[0]?.startsWith('/') ? '/' : '';
    return prefix + first.slice(0, length).join('/');
}

/**
 * Determine the prefix stripped from every path before tree insertion.
 *
 * For each path the leading components before the first templated one
 * are taken, minus the last. If any path has no such prefix, the result
 * is `/`; otherwise it is the common path of all prefixes.
 *
 * @example
 * determinePathPrefix(['/api/users/', '/api/users/{id}/', '/api/groups/']) // '/api'
 */
export function determinePathPrefix(paths: readonly string[]): string {
    const prefixes: string[] = [];

    for (const path of paths) {
        const initial: string[] = [];
        for (const component of pathComponents(path)) {
            if (component.includes('{')) break;
            initial.push(component);
        }
        const prefix = initial.slice(0, -1).join('/');
        if (!prefix) return '/';
        prefixes.push(`/${prefix}/`);
    }

    return commonPath(prefixes);
}

/**
 * Rename `{pk}` after the model's primary key (`{id}`, `{uuid}`, ...).
 */
export function coercePathPk(path: string, model: ModelMeta | undefined): string {
    if (!path.includes('{pk}') || model === undefined) return path;
    const pkName = model.pkName ?? 'id';
    return path.split('{pk}').join(`{${pkName}}`);
}

/** Replace every occurrence of a template variable by a literal value */
export function substituteVariable(path: string, name: string, value: string): string {
    return path.split(`{${name}}`).join(value);
}
