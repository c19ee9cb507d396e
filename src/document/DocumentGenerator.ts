/**
 * DocumentGenerator — Route Table → ApiDocument
 *
 * Entry point of the library. Each {@link DocumentGenerator.getSchema}
 * call walks the route table once:
 *
 *   1. Drop views that opt out of documentation
 *   2. Rename `{pk}` after the model's primary key (optional)
 *   3. Compute the path prefix over the remaining routes
 *   4. Drop endpoints the request may not see
 *   5. Compile each endpoint into a link
 *   6. Assemble the links into the document tree
 *
 * A link that fails to compile is left out of the document and reported
 * through the debug observer. Version errors are not: they describe the
 * request and reach the caller.
 *
 * @example
 * ```typescript
 * const generator = new DocumentGenerator(routes, loadConfig());
 * const doc = generator.getSchema({ request: { version: '1.5' } });
 * ```
 *
 * @module
 */
import { mergeConfig, type GeneratorConfig, type PartialConfig } from '../config/GeneratorConfig.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { createView, hasViewPermissions } from '../routing/RouteRegistry.js';
import { coercePathPk, determinePathPrefix } from '../routing/PathTemplate.js';
import type { BoundView, RequestContext, RouteTable } from '../routing/types.js';
import type { FieldIntrospector } from '../schema/FieldIntrospector.js';
import type { ParameterExtractor } from '../schema/ParameterExtractor.js';
import { NoMatchingVersionError, VersionParseError } from '../versioning/VersionErrors.js';
import { LinkCompilationError } from './LinkCompilationError.js';
import { compileLink, type LinkContext } from './LinkCompiler.js';
import { assemble, type PlacedLink } from './PathTree.js';
import type { ApiDocument } from './types.js';

/** Replaceable collaborators */
export interface GeneratorOptions {
    readonly debug?: DebugObserverFn;
    readonly introspect?: FieldIntrospector;
    readonly extractParameters?: ParameterExtractor;
}

export interface SchemaRequest {
    /** The request asking for the document */
    readonly request?: RequestContext;
    /** Ignore per-request permissions */
    readonly public?: boolean;
}

interface Candidate {
    readonly path: string;
    readonly view: BoundView;
}

export class DocumentGenerator {
    readonly config: GeneratorConfig;
    private readonly _routes: RouteTable;
    private readonly _options: GeneratorOptions;

    constructor(routes: RouteTable, config: PartialConfig = {}, options: GeneratorOptions = {}) {
        this._routes = routes;
        this.config = mergeConfig(config);
        this._options = options;
    }

    /**
     * Generate the document for a request.
     *
     * @returns The document, or `undefined` when no endpoint is visible
     * @throws {VersionParseError | NoMatchingVersionError} When the
     *         request version cannot select a shape
     */
    getSchema(schemaRequest: SchemaRequest = {}): ApiDocument | undefined {
        const startTime = performance.now();
        const { request } = schemaRequest;
        const debug = this._options.debug;

        // ── Enumerate ──
        const candidates: Candidate[] = [];
        for (const endpoint of this._routes.endpoints()) {
            const view = createView(endpoint, schemaRequest.public ? undefined : request);
            if (endpoint.view.excludeFromSchema) {
                debug?.(routeEvent(endpoint.path, view, 'excluded'));
                continue;
            }
            const path = this.config.coercePathPk
                ? coercePathPk(endpoint.path, endpoint.view.model)
                : endpoint.path;
            candidates.push({ path, view });
        }

        const prefix = candidates.length > 0
            ? determinePathPrefix(candidates.map(c => c.path))
            : '/';

        // ── Compile ──
        const context: LinkContext = {
            documentVersion: this.config.version,
            runtimeVersion: request?.version ?? this.config.version,
            partialUpdateMethods: this.config.partialUpdateMethods,
            ...(this._options.introspect !== undefined ? { introspect: this._options.introspect } : {}),
            ...(this._options.extractParameters !== undefined
                ? { extractParameters: this._options.extractParameters } : {}),
            ...(debug !== undefined ? { debug } : {}),
        };

        const placed: PlacedLink[] = [];
        for (const { path, view } of candidates) {
            if (!hasViewPermissions(view)) {
                debug?.(routeEvent(path, view, 'forbidden'));
                continue;
            }
            try {
                placed.push({ path, view, link: compileLink(path, view, context) });
            } catch (err) {
                if (err instanceof VersionParseError || err instanceof NoMatchingVersionError) throw err;
                const failure = err instanceof LinkCompilationError
                    ? err
                    : new LinkCompilationError(path, view.method, describeError(err), err);
                debug?.(skippedEvent(path, view, failure));
            }
        }

        // ── Assemble ──
        const skipped = new Set<PlacedLink>();
        const content = assemble(placed, {
            prefix,
            onSkip: (entry, error) => {
                skipped.add(entry);
                debug?.(skippedEvent(entry.path, entry.view, error));
            },
        });

        if (debug) {
            for (const entry of placed) {
                if (skipped.has(entry)) continue;
                debug({
                    type: 'link',
                    path: entry.path,
                    method: entry.view.method,
                    outcome: 'compiled',
                    fieldCount: entry.link.fields.length,
                    timestamp: Date.now(),
                });
            }
            debug({
                type: 'document',
                version: this.config.version,
                linkCount: placed.length - skipped.size,
                empty: content === undefined,
                durationMs: performance.now() - startTime,
                timestamp: Date.now(),
            });
        }

        if (content === undefined) return undefined;

        const url = this.config.url ?? request?.absoluteUrl;
        return Object.freeze({
            version: this.config.version,
            ...(this.config.title !== undefined ? { title: this.config.title } : {}),
            ...(this.config.description !== undefined ? { description: this.config.description } : {}),
            ...(url !== undefined ? { url } : {}),
            content,
        });
    }
}

// ── Internal ─────────────────────────────────────────────

function routeEvent(path: string, view: BoundView, reason: 'excluded' | 'forbidden') {
    return {
        type: 'route' as const,
        path,
        method: view.method,
        reason,
        timestamp: Date.now(),
    };
}

function skippedEvent(path: string, view: BoundView, error: LinkCompilationError) {
    return {
        type: 'link' as const,
        path,
        method: view.method,
        outcome: 'skipped' as const,
        error: error.message,
        timestamp: Date.now(),
    };
}

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
