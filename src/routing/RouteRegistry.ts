/**
 * RouteRegistry — In-Memory Route Table
 *
 * The default {@link RouteTable}: views are registered once per path and
 * expanded into one endpoint per documented method.
 *
 * @example
 * ```typescript
 * const routes = new RouteRegistry();
 *
 * routes.register('/pets/', {
 *     methods: ['GET', 'POST'],
 *     actions: { GET: 'list', POST: 'create' },
 *     serializer: PetShape,
 *     pagination: { kind: 'page-number' },
 * });
 *
 * routes.has('/pets/', 'GET'); // true
 * routes.size;                 // 2
 * ```
 *
 * @module
 */
import type {
    BoundView, HttpMethod, RequestContext, RouteEndpoint, RouteTable, ViewDefinition,
} from './types.js';

/** Methods that exist on every view and are never documented */
const UNDOCUMENTED_METHODS: ReadonlySet<HttpMethod> = new Set(['HEAD', 'OPTIONS']);

export class RouteRegistry implements RouteTable {
    private readonly _endpoints = new Map<string, RouteEndpoint>();

    /**
     * Register a view under a path template.
     *
     * @throws If any of the view's methods is already registered for the path
     */
    register(path: string, view: ViewDefinition): void {
        const methods = view.methods.filter(m => !UNDOCUMENTED_METHODS.has(m));

        for (const method of methods) {
            if (this._endpoints.has(endpointKey(path, method))) {
                throw new Error(`Route "${method} ${path}" is already registered.`);
            }
        }
        for (const method of methods) {
            this._endpoints.set(endpointKey(path, method), Object.freeze({ path, method, view }));
        }
    }

    /** Register several `[path, view]` pairs */
    registerAll(...routes: readonly (readonly [string, ViewDefinition])[]): void {
        for (const [path, view] of routes) {
            this.register(path, view);
        }
    }

    has(path: string, method: HttpMethod): boolean {
        return this._endpoints.has(endpointKey(path, method));
    }

    /** Endpoints in registration order */
    endpoints(): readonly RouteEndpoint[] {
        return [...this._endpoints.values()];
    }

    get size(): number {
        return this._endpoints.size;
    }

    /** Remove every route (tests) */
    clear(): void {
        this._endpoints.clear();
    }
}

function endpointKey(path: string, method: HttpMethod): string {
    return `${method} ${path}`;
}

/**
 * Prepare a view for one endpoint and request.
 */
export function createView(endpoint: RouteEndpoint, request?: RequestContext): BoundView {
    const action = endpoint.view.actions?.[endpoint.method];
    return Object.freeze({
        definition: endpoint.view,
        method: endpoint.method,
        ...(action !== undefined ? { action } : {}),
        ...(request !== undefined ? { request } : {}),
    });
}

/**
 * Whether the endpoint is visible to the request.
 * Without a request (public documents) every endpoint is visible.
 */
export function hasViewPermissions(view: BoundView): boolean {
    if (view.request === undefined || view.definition.checkPermissions === undefined) {
        return true;
    }
    return view.definition.checkPermissions(view.request);
}
