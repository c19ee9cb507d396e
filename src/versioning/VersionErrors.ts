/**
 * Version Errors — Caller-Visible Resolution Failures
 *
 * Both errors indicate a genuine configuration or request problem and
 * are propagated untouched through link compilation and document
 * generation. The request layer decides how to surface them
 * (e.g. HTTP 400 for an unknown version).
 *
 * @example
 * ```typescript
 * try {
 *     generator.getSchema({ request });
 * } catch (e) {
 *     if (e instanceof NoMatchingVersionError) {
 *         reply.status(400).send(`Unsupported version ${e.requestedVersion}`);
 *     }
 * }
 * ```
 *
 * @module
 */

/**
 * Thrown when a version string (in a constraint or at runtime) is malformed.
 */
export class VersionParseError extends Error {
    /** The raw input that failed to parse */
    readonly input: string;

    constructor(input: string, cause?: unknown) {
        super(`Invalid version "${input}"`, cause !== undefined ? { cause } : undefined);
        this.name = 'VersionParseError';
        this.input = input;
    }
}

/**
 * Thrown when no entry of a version map accepts the requested version.
 */
export class NoMatchingVersionError extends Error {
    /** The runtime version that matched nothing */
    readonly requestedVersion: string;
    /** Constraint texts that were tried, in declaration order */
    readonly constraints: readonly string[];

    constructor(requestedVersion: string, constraints: readonly string[]) {
        super(`Invalid request version ${requestedVersion}`);
        this.name = 'NoMatchingVersionError';
        this.requestedVersion = requestedVersion;
        this.constraints = Object.freeze([...constraints]);
    }
}
