/**
 * CyclicDescriptorError — Self-Referencing Shapes
 *
 * Nested fields may point at their shape through a thunk, which makes
 * true cycles expressible (`Category.parent → Category`). Schema
 * derivation walks nested shapes depth-first and refuses to re-enter a
 * shape already on the current path.
 *
 * @example
 * ```typescript
 * const Category: ShapeDescriptor = defineShape('Category', {
 *     fields: { parent: field.nested(() => Category) },
 * });
 *
 * composeResponse(Category);
 * // CyclicDescriptorError: Cyclic shape reference: Category → Category
 * ```
 *
 * @module
 */
export class CyclicDescriptorError extends Error {
    /** Shape names from the outermost shape to the repeated one */
    readonly path: readonly string[];

    constructor(path: readonly string[]) {
        super(`Cyclic shape reference: ${path.join(' → ')}`);
        this.name = 'CyclicDescriptorError';
        this.path = Object.freeze([...path]);
    }
}
