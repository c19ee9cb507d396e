/**
 * ActionKeys — Document Keys for an Endpoint
 *
 * An endpoint is placed in the document under its named path segments
 * followed by an action key. The action is resolved by cascade:
 *
 *   1. The view's own action for the method (viewset-style routing)
 *   2. `list` for a `GET` on a collection path (last segment not templated)
 *   3. The CRUD default for the method
 *
 * `retrieve` and `destroy` are shown as `read` and `delete`.
 *
 * @module
 */
import { namedPathComponents, pathComponents } from './PathTemplate.js';
import type { BoundView, HttpMethod } from './types.js';

/** HTTP method → CRUD action */
const DEFAULT_MAPPING: Readonly<Record<HttpMethod, string>> = {
    GET:     'retrieve',
    POST:    'create',
    PUT:     'update',
    PATCH:   'partial_update',
    DELETE:  'destroy',
    HEAD:    'retrieve',
    OPTIONS: 'options',
};

/** Actions shown under a friendlier key */
const COERCE_METHOD_NAMES: Readonly<Record<string, string>> = {
    retrieve: 'read',
    destroy:  'delete',
};

const STANDARD_ACTIONS: ReadonlySet<string> = new Set([
    'list', 'retrieve', 'create', 'update', 'partial_update', 'destroy',
]);

// ── Public API ───────────────────────────────────────────

/** Whether the endpoint returns a collection */
export function isListView(path: string, view: BoundView): boolean {
    if (view.method !== 'GET') return false;
    if (view.action !== undefined) return view.action === 'list';

    const components = pathComponents(path);
    const last = components[components.length - 1];
    return !(last !== undefined && last.includes('{'));
}

/** The action name an endpoint answers to */
export function resolveAction(path: string, view: BoundView): string {
    if (view.action !== undefined) return view.action;
    return isListView(path, view) ? 'list' : DEFAULT_MAPPING[view.method];
}

/**
 * Keys under which an endpoint is inserted into the document tree.
 *
 * @param subpath - Path with the common prefix already stripped
 *
 * @example
 * ('/pets/', GET)          → ['pets', 'list']
 * ('/pets/{id}/', GET)     → ['pets', 'read']
 * ('/pets/{id}/', DELETE)  → ['pets', 'delete']
 * ('/pets/{id}/adopt/', POST, action 'adopt') → ['pets', 'adopt']
 */
export function getKeys(subpath: string, view: BoundView): string[] {
    const action = resolveAction(subpath, view);
    const named = namedPathComponents(subpath);

    if (!STANDARD_ACTIONS.has(action)) {
        const actionCount = Object.keys(view.definition.actions ?? {}).length;
        if (actionCount > 1) {
            return [...named, coerce(DEFAULT_MAPPING[view.method])];
        }
        return [...named.slice(0, -1), action];
    }

    return [...named, coerce(action)];
}

function coerce(action: string): string {
    return COERCE_METHOD_NAMES[action] ?? action;
}
