/**
 * VersionMap — Version-Constrained Shape Selection
 *
 * Maps a runtime API version to one of several alternative shape
 * descriptors. Each entry pairs a constraint (comma-separated clauses,
 * AND-combined) with a shape:
 *
 * ```typescript
 * const MeShape = defineVersionMap({
 *     doc: 'The authenticated user.',
 *     versions: [
 *         ['>1.3, <=1.6', MeShapeV16],
 *         ['>1.6',        MeShapeV17],
 *     ],
 * });
 *
 * MeShape.resolve('1.5'); // MeShapeV16
 * ```
 *
 * Entries are not assumed to be mutually exclusive: the first entry
 * (in declaration order) whose every clause holds wins.
 *
 * @module
 */
import type { ShapeDescriptor } from '../shape/ShapeDescriptors.js';
import { matchesClause, parseClause, type VersionClause } from './VersionComparator.js';
import { NoMatchingVersionError } from './VersionErrors.js';

// ── Types ────────────────────────────────────────────────

/** A parsed, immutable AND-combination of clauses */
export interface VersionConstraint {
    readonly source: string;
    readonly clauses: readonly VersionClause[];
}

export interface VersionMapEntry {
    readonly constraint: VersionConstraint;
    readonly shape: ShapeDescriptor;
}

/** Declaration input: `[constraint, shape]` tuples */
export type VersionMapInput = readonly (readonly [string, ShapeDescriptor])[];

export interface VersionMapDefinition {
    /** Documentation appended to endpoint descriptions */
    readonly doc?: string;
    readonly versions: VersionMapInput;
}

// ── Constraints ──────────────────────────────────────────

/**
 * Parse a comma-separated constraint into its clauses.
 *
 * @throws {VersionParseError} When any clause carries a malformed version
 */
export function parseConstraint(source: string): VersionConstraint {
    const clauses = source
        .split(',')
        .map(part => part.trim())
        .map(part => parseClause(part));
    return Object.freeze({ source, clauses: Object.freeze(clauses) });
}

/**
 * Whether every clause of the constraint holds for `runtimeVersion`.
 * Stops at the first clause that does not.
 */
export function satisfies(constraint: VersionConstraint, runtimeVersion: string): boolean {
    return constraint.clauses.every(clause => matchesClause(clause, runtimeVersion));
}

// ── Resolution ───────────────────────────────────────────

/**
 * Resolve a runtime version to the first matching shape.
 *
 * @throws {NoMatchingVersionError} When no entry matches
 * @throws {VersionParseError} When `runtimeVersion` is malformed
 */
export function resolveVersion(
    entries: readonly VersionMapEntry[],
    runtimeVersion: string,
): VersionMapEntry {
    for (const entry of entries) {
        if (satisfies(entry.constraint, runtimeVersion)) return entry;
    }
    throw new NoMatchingVersionError(
        runtimeVersion,
        entries.map(e => e.constraint.source),
    );
}

// ── VersionedShape ───────────────────────────────────────

/**
 * A family of shapes selected by API version.
 *
 * Immutable once constructed; constraints are parsed eagerly so that a
 * malformed declaration fails at startup rather than per request.
 */
export class VersionedShape {
    readonly kind = 'versioned' as const;
    readonly doc: string | undefined;
    readonly entries: readonly VersionMapEntry[];

    constructor(definition: VersionMapDefinition) {
        this.doc = definition.doc;
        this.entries = Object.freeze(
            definition.versions.map(([constraint, shape]) =>
                Object.freeze({ constraint: parseConstraint(constraint), shape }),
            ),
        );
    }

    /** Resolve to the matching entry (constraint included) */
    match(runtimeVersion: string): VersionMapEntry {
        return resolveVersion(this.entries, runtimeVersion);
    }

    /** Resolve to the matching shape */
    resolve(runtimeVersion: string): ShapeDescriptor {
        return this.match(runtimeVersion).shape;
    }
}

/** Declare a versioned shape family */
export function defineVersionMap(definition: VersionMapDefinition): VersionedShape {
    return new VersionedShape(definition);
}

/** A shape reference that may need version resolution */
export type ShapeRef = ShapeDescriptor | VersionedShape;

export function isVersioned(ref: ShapeRef): ref is VersionedShape {
    return ref.kind === 'versioned';
}
