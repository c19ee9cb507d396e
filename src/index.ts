/**
 * @module
 * @description
 * Version selection for shape families.
 */
// ── Versioning ───────────────────────────────────────────
/** @category Versioning */
export {
    type Comparator, type VersionClause,
    parseVersion, compareVersions, parseClause, matchesClause, evaluateClause,
} from './versioning/VersionComparator.js';
/** @category Versioning */
export {
    type VersionConstraint, type VersionMapEntry, type VersionMapInput, type VersionMapDefinition,
    type ShapeRef,
    parseConstraint, satisfies, resolveVersion,
    VersionedShape, defineVersionMap, isVersioned,
} from './versioning/VersionMap.js';
/** @category Versioning */
export { VersionParseError, NoMatchingVersionError } from './versioning/VersionErrors.js';

// ── Shapes ───────────────────────────────────────────────
/** @category Shapes */
export {
    type Localizable, type FieldOptions, type FieldDef, type FieldKind, type ShapeField,
    type PrimitiveFieldDef, type ListFieldDef, type NestedFieldDef,
    type HiddenFieldDef, type DictFieldDef, type JsonFieldDef,
    type ShapeMeta, type ShapeDescriptor, type ShapeDefinition,
    type StringFieldOptions, type NumberFieldOptions, type NestedFieldOptions,
    defineShape, listOf, resolveNestedShape, field,
} from './shape/ShapeDescriptors.js';

/**
 * @module
 * @description
 * Field, response and pagination schema derivation.
 */
// ── Schema ───────────────────────────────────────────────
/** @category Schema */
export { type FieldIntrospector, introspectField, fallbackSchema } from './schema/FieldIntrospector.js';
/** @category Schema */
export { type ParameterExtractor, extractParameters } from './schema/ParameterExtractor.js';
/** @category Schema */
export {
    type DeriveContext, DEFAULT_PARTIAL_UPDATE_METHODS,
    deriveField, deriveRequestFields, requestLocation,
} from './schema/FieldDeriver.js';
/** @category Schema */
export {
    type ComposeOptions, type ComposedResponse,
    composeResponse, collectErrorStatusCodes,
} from './schema/ResponseComposer.js';
/** @category Schema */
export {
    type PaginationStrategy, type PageNumberPagination, type LimitOffsetPagination,
    type CursorPagination, type ProxyPagination, type CustomPagination,
    resolvePaginationStrategy, wrapForPagination, paginationQueryFields,
} from './schema/PaginationShapes.js';
/** @category Schema */
export { CyclicDescriptorError } from './schema/CyclicDescriptorError.js';

// ── Routing ──────────────────────────────────────────────
/** @category Routing */
export type {
    HttpMethod, RequestContext, ModelFieldType, ModelFieldMeta, ModelMeta,
    HandlerMeta, FilterBackend, ViewDefinition, RouteEndpoint, RouteTable, BoundView,
} from './routing/types.js';
/** @category Routing */
export { RouteRegistry, createView, hasViewPermissions } from './routing/RouteRegistry.js';
/** @category Routing */
export {
    pathVariables, pathComponents, namedPathComponents,
    commonPath, determinePathPrefix, coercePathPk,
} from './routing/PathTemplate.js';
/** @category Routing */
export { isListView, resolveAction, getKeys } from './routing/ActionKeys.js';

/**
 * @module
 * @description
 * Link compilation and document assembly.
 */
// ── Document ─────────────────────────────────────────────
/** @category Document */
export {
    type SchemaFragment, type FieldLocation, type FieldDescriptor,
    type ResponseSchema, type ErrorStatus, type ErrorStatusMap,
    type Link, type DocumentNode, type ApiDocument,
    isLink,
} from './document/types.js';
/** @category Document */
export { type LinkContext, compileLink, getPathFields } from './document/LinkCompiler.js';
/** @category Document */
export { type PlacedLink, type AssembleOptions, LinkTree, assemble } from './document/PathTree.js';
/** @category Document */
export { LinkCompilationError } from './document/LinkCompilationError.js';
/** @category Document */
export {
    type GeneratorOptions, type SchemaRequest,
    DocumentGenerator,
} from './document/DocumentGenerator.js';

// ── Configuration ────────────────────────────────────────
/** @category Configuration */
export {
    type GeneratorConfig, type PartialConfig,
    DEFAULT_CONFIG, mergeConfig,
} from './config/GeneratorConfig.js';
/** @category Configuration */
export { loadConfig } from './config/ConfigLoader.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export {
    type DebugEvent, type DebugObserverFn,
    type RouteEvent, type VersionEvent, type LinkEvent, type DocumentEvent,
    createDebugObserver,
} from './observability/DebugObserver.js';
