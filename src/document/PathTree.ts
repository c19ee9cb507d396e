/**
 * PathTree — Link Tree Assembly
 *
 * Links are placed under the named segments of their (prefix-stripped)
 * path followed by their action key:
 *
 * ```
 * /api/pets/          GET   → pets.list
 * /api/pets/{id}/     GET   → pets.read
 * /api/owners/        POST  → owners.create
 * ```
 *
 * Insertion is two-phase. Links are first staged on their parent node;
 * once every link is in, they are distributed next to the child nodes
 * (children first). A link whose key is already taken gets the first
 * free `key_N` suffix.
 *
 * @module
 */
import type { DocumentNode, Link } from './types.js';
import { LinkCompilationError } from './LinkCompilationError.js';
import { getKeys } from '../routing/ActionKeys.js';
import { determinePathPrefix } from '../routing/PathTemplate.js';
import type { BoundView } from '../routing/types.js';

/** A compiled link together with the endpoint it documents */
export interface PlacedLink {
    readonly path: string;
    readonly view: BoundView;
    readonly link: Link;
}

export interface AssembleOptions {
    /** Prefix stripped from every path; computed from the entries when omitted */
    readonly prefix?: string;
    /** Called for each link that cannot be placed */
    readonly onSkip?: (entry: PlacedLink, error: LinkCompilationError) => void;
}

// ============================================================================
// LinkTree
// ============================================================================

class StagingNode {
    readonly children = new Map<string, StagingNode>();
    readonly links: (readonly [string, Link])[] = [];
}

/**
 * Mutable builder for a {@link DocumentNode} tree.
 *
 * @example
 * ```typescript
 * const tree = new LinkTree();
 * tree.insert(['pets', 'list'], listLink);
 * tree.insert(['pets', 'read'], readLink);
 * tree.build(); // { kind: 'node', children: { pets: { kind: 'node', children: { list, read } } } }
 * ```
 */
export class LinkTree {
    private readonly _root = new StagingNode();
    private _size = 0;

    /**
     * Stage a link under `keys` (segments…, action).
     *
     * @throws {LinkCompilationError} When `keys` is empty
     */
    insert(keys: readonly string[], link: Link): void {
        const actionKey = keys[keys.length - 1];
        if (actionKey === undefined) {
            throw new LinkCompilationError(link.url, link.action.toUpperCase(), 'no document key');
        }

        let target = this._root;
        for (const key of keys.slice(0, -1)) {
            let child = target.children.get(key);
            if (child === undefined) {
                child = new StagingNode();
                target.children.set(key, child);
            }
            target = child;
        }
        target.links.push([actionKey, link]);
        this._size++;
    }

    /** Number of staged links */
    get size(): number {
        return this._size;
    }

    /** Distribute the staged links; `undefined` when nothing was inserted */
    build(): DocumentNode | undefined {
        return this._size === 0 ? undefined : distribute(this._root);
    }
}

function distribute(node: StagingNode): DocumentNode {
    const entries = new Map<string, DocumentNode | Link>();

    for (const [key, child] of node.children) {
        entries.set(key, distribute(child));
    }
    for (const [preferred, link] of node.links) {
        entries.set(availableKey(entries, preferred), link);
    }

    return Object.freeze({
        kind: 'node' as const,
        children: Object.freeze(Object.fromEntries(entries)),
    });
}

function availableKey(taken: ReadonlyMap<string, unknown>, preferred: string): string {
    if (!taken.has(preferred)) return preferred;
    let i = 0;
    while (taken.has(`${preferred}_${i}`)) i++;
    return `${preferred}_${i}`;
}

// ============================================================================
// Assembly
// ============================================================================

/**
 * Assemble compiled links into the document content tree.
 *
 * A link that cannot be placed is reported through `onSkip` and left
 * out; the others are still assembled.
 *
 * @returns The root node, or `undefined` when no link was placed
 */
export function assemble(
    entries: readonly PlacedLink[],
    options: AssembleOptions = {},
): DocumentNode | undefined {
    const prefix = options.prefix ?? determinePathPrefix(entries.map(e => e.path));
    const tree = new LinkTree();

    for (const entry of entries) {
        const subpath = entry.path.startsWith(prefix) ? entry.path.slice(prefix.length) : entry.path;
        try {
            tree.insert(getKeys(subpath, entry.view), entry.link);
        } catch (err) {
            if (!(err instanceof LinkCompilationError)) throw err;
            options.onSkip?.(entry, err);
        }
    }

    return tree.build();
}
