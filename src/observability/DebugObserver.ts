/**
 * DebugObserver — Opt-In Observability for Document Generation
 *
 * Typed debug events are emitted at each stage of document generation.
 * When no observer is configured (the default), nothing is emitted.
 *
 * @example
 * ```typescript
 * import { createDebugObserver, DocumentGenerator } from 'shapedoc';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. forward to the application logger)
 * const debug = createDebugObserver((event) => {
 *     logger.debug(event, `shapedoc ${event.type}`);
 * });
 *
 * new DocumentGenerator(routes, { version: '1.0' }, { debug });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/**
 * Emitted when an endpoint is left out before link compilation,
 * either because the view opts out or the request may not see it.
 */
export interface RouteEvent {
    readonly type: 'route';
    readonly path: string;
    readonly method: string;
    readonly reason: 'excluded' | 'forbidden';
    readonly timestamp: number;
}

/**
 * Emitted when a versioned shape is resolved for a link.
 */
export interface VersionEvent {
    readonly type: 'version';
    readonly path: string;
    readonly method: string;
    readonly role: 'request' | 'response';
    readonly requestedVersion: string;
    /** Source text of the matching constraint */
    readonly constraint: string;
    readonly shape: string;
    readonly timestamp: number;
}

/**
 * Emitted once per endpoint after link compilation and insertion.
 * Skipped links carry the error that removed them from the document.
 */
export interface LinkEvent {
    readonly type: 'link';
    readonly path: string;
    readonly method: string;
    readonly outcome: 'compiled' | 'skipped';
    /** Number of parameters on a compiled link */
    readonly fieldCount?: number;
    readonly error?: string;
    readonly timestamp: number;
}

/**
 * Emitted at the end of every generation call.
 */
export interface DocumentEvent {
    readonly type: 'document';
    readonly version: string;
    readonly linkCount: number;
    /** No visible link: the caller receives no document */
    readonly empty: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * Use a `switch` on `event.type` for exhaustive handling.
 */
export type DebugEvent =
    | RouteEvent
    | VersionEvent
    | LinkEvent
    | DocumentEvent;

/**
 * Observer function that receives debug events.
 */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * If a custom handler is provided it is returned as is. The default
 * handler writes compact lines with `console.debug`:
 *
 * ```
 * [shapedoc] route     GET /admin/ (forbidden)
 * [shapedoc] version   GET /me/ response 1.5 → MeV16 (>1.3, <=1.6)
 * [shapedoc] link      GET /pets/ ✓ 3 fields
 * [shapedoc] document  1.0 ✓ 12 links 4.2ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[shapedoc]';

        switch (event.type) {
            case 'route':
                console.debug(`${prefix} route     ${event.method} ${event.path} (${event.reason})`);
                break;

            case 'version':
                console.debug(
                    `${prefix} version   ${event.method} ${event.path} ${event.role} ` +
                    `${event.requestedVersion} → ${event.shape} (${event.constraint})`,
                );
                break;

            case 'link': {
                const status = event.outcome === 'compiled'
                    ? `✓ ${event.fieldCount ?? 0} fields`
                    : `✗ ${event.error ?? ''}`;
                console.debug(`${prefix} link      ${event.method} ${event.path} ${status}`);
                break;
            }

            case 'document': {
                const icon = event.empty ? '∅' : '✓';
                console.debug(
                    `${prefix} document  ${event.version} ${icon} ${event.linkCount} links ${event.durationMs.toFixed(1)}ms`,
                );
                break;
            }
        }
    };
}
