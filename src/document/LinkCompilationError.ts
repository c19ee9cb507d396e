/**
 * LinkCompilationError — Per-Endpoint Failure
 *
 * Raised when a single endpoint cannot be compiled or placed in the
 * document tree. Document generation recovers locally: the link is
 * dropped, a `link` debug event with outcome `skipped` is emitted, and
 * the remaining endpoints are still documented.
 *
 * Version resolution errors are never wrapped: they describe the request,
 * not the endpoint, and reach the caller unchanged.
 *
 * @module
 */
export class LinkCompilationError extends Error {
    readonly path: string;
    readonly method: string;

    constructor(path: string, method: string, reason: string, cause?: unknown) {
        super(
            `Cannot document ${method} ${path}: ${reason}`,
            cause !== undefined ? { cause } : undefined,
        );
        this.name = 'LinkCompilationError';
        this.path = path;
        this.method = method;
    }
}
