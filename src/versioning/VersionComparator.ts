/**
 * VersionComparator — Comparator Clause Parsing & Evaluation
 *
 * A clause is one of:
 *
 *   1. `VERSION`        (same as `==VERSION`)
 *   2. `==VERSION`
 *   3. `>VERSION`
 *   4. `<VERSION`
 *   5. `>=VERSION`
 *   6. `<=VERSION`
 *
 * Two-character comparators are matched before one-character ones.
 * Versions are ordered semantically (`1.10 > 1.9`), never lexicographically.
 *
 * Pure-function module: no state, no side effects.
 *
 * @module
 */
import semver from 'semver';
import { VersionParseError } from './VersionErrors.js';

// ── Types ────────────────────────────────────────────────

export type Comparator = '>' | '<' | '==' | '>=' | '<=';

/** One parsed comparator expression */
export interface VersionClause {
    readonly comparator: Comparator;
    readonly version: string;
}

// ── Comparators ──────────────────────────────────────────

const TWO_CHAR: ReadonlySet<string> = new Set(['==', '>=', '<=']);
const ONE_CHAR: ReadonlySet<string> = new Set(['>', '<']);

function isComparator(value: string, allowed: ReadonlySet<string>): value is Comparator {
    return allowed.has(value);
}

const OPERATORS: Readonly<Record<Comparator, (order: number) => boolean>> = {
    '>':  order => order > 0,
    '<':  order => order < 0,
    '==': order => order === 0,
    '>=': order => order >= 0,
    '<=': order => order <= 0,
};

// ── Versions ─────────────────────────────────────────────

/** `MAJOR[.MINOR[.PATCH]]` with optional `v` prefix and pre-release suffix */
const VERSION_PATTERN = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(-[0-9A-Za-z.-]+)?$/;

/**
 * Normalize a version string to a full semver version.
 *
 * Missing components are padded with zero, so `1`, `1.0` and `1.0.0`
 * compare equal.
 *
 * @throws {VersionParseError} When the input is not a version
 */
export function parseVersion(input: string): string {
    const match = VERSION_PATTERN.exec(input.trim());
    if (!match) throw new VersionParseError(input);

    const [, major, minor = '0', patch = '0', prerelease = ''] = match;
    const normalized = semver.valid(`${major}.${minor}.${patch}${prerelease}`);
    if (normalized === null) throw new VersionParseError(input);
    return normalized;
}

/**
 * Compare two version strings.
 *
 * @returns A negative number, zero, or a positive number
 */
export function compareVersions(a: string, b: string): number {
    return semver.compare(parseVersion(a), parseVersion(b));
}

// ── Clauses ──────────────────────────────────────────────

/**
 * Parse a single clause into its comparator and target version.
 *
 * @throws {VersionParseError} When the target version is malformed
 */
export function parseClause(clause: string): VersionClause {
    const text = clause.trim();

    const twoChar = text.slice(0, 2);
    if (isComparator(twoChar, TWO_CHAR)) {
        return freezeClause(twoChar, text.slice(2));
    }

    const oneChar = text.slice(0, 1);
    if (isComparator(oneChar, ONE_CHAR)) {
        return freezeClause(oneChar, text.slice(1));
    }

    return freezeClause('==', text);
}

function freezeClause(comparator: Comparator, version: string): VersionClause {
    const target = version.trim();
    parseVersion(target);
    return Object.freeze({ comparator, version: target });
}

/** Whether `runtimeVersion` satisfies an already-parsed clause */
export function matchesClause(clause: VersionClause, runtimeVersion: string): boolean {
    return OPERATORS[clause.comparator](compareVersions(runtimeVersion, clause.version));
}

/**
 * Evaluate a clause string against a runtime version.
 *
 * @example
 * ```typescript
 * evaluateClause('>=1.0', '1.0');  // true
 * evaluateClause('<1.0', '1.0');   // false
 * evaluateClause('>1.9', '1.10');  // true
 * ```
 */
export function evaluateClause(clause: string, runtimeVersion: string): boolean {
    return matchesClause(parseClause(clause), runtimeVersion);
}
