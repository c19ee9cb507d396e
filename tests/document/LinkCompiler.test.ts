import { describe, it, expect } from 'vitest';
import {
    compileLink, getPathFields, pkDescription, shapeDoc, type LinkContext,
} from '../../src/document/LinkCompiler.js';
import type { FieldDescriptor } from '../../src/document/types.js';
import type { DebugEvent } from '../../src/observability/DebugObserver.js';
import { createView } from '../../src/routing/RouteRegistry.js';
import type {
    BoundView, FilterBackend, HttpMethod, ModelMeta, ViewDefinition,
} from '../../src/routing/types.js';
import { defineShape, field } from '../../src/shape/ShapeDescriptors.js';
import { NoMatchingVersionError } from '../../src/versioning/VersionErrors.js';
import { defineVersionMap } from '../../src/versioning/VersionMap.js';

// ============================================================================
// LinkCompiler Tests
// ============================================================================

// ── Helpers ──

const CONTEXT: LinkContext = { documentVersion: '1.0', runtimeVersion: '1.0' };

const Pet = defineShape('Pet', {
    fields: {
        id: field.integer({ readOnly: true }),
        name: field.string({ helpText: 'Pet name' }),
    },
    errorStatusCodes: { 404: 'Pet not found' },
});

const PET_SCHEMA = {
    type: 'object',
    properties: {
        id: { type: 'integer' },
        name: { type: 'string', description: 'Pet name' },
    },
    required: ['name'],
};

const petModel: ModelMeta = {
    name: 'Pet',
    verboseName: 'pet',
    fields: { id: { primaryKey: true, type: 'auto', verboseName: 'ID' } },
};

const SEARCH: FieldDescriptor = { name: 'search', location: 'query', required: false, schema: { type: 'string' } };
const searchBackend: FilterBackend = { getSchemaFields: () => [SEARCH] };

const PetList: ViewDefinition = {
    description: 'Pets',
    methods: ['GET', 'POST'],
    actions: { GET: 'list', POST: 'create' },
    serializer: Pet,
    pagination: { kind: 'page-number' },
};

const PetDetail: ViewDefinition = {
    methods: ['GET', 'PUT', 'PATCH', 'DELETE'],
    actions: { GET: 'retrieve', PUT: 'update', PATCH: 'partial_update', DELETE: 'destroy' },
    serializer: Pet,
    model: petModel,
    filterBackends: [searchBackend],
    handlers: { retrieve: { description: 'Fetch one pet', doc: 'The pet.' } },
};

const MeV16 = defineShape('MeV16', { fields: { username: field.string() } });
const MeV17 = defineShape('MeV17', { fields: { username: field.string(), email: field.email() } });
const MeShape = defineVersionMap({
    doc: '  The user.\n  Fields vary by version.  ',
    versions: [
        ['>1.3, <=1.6', MeV16],
        ['>1.6', MeV17],
    ],
});

const MeView: ViewDefinition = {
    methods: ['GET', 'PUT'],
    handlers: {
        get: { description: 'Current user', responseShape: MeShape, doc: 'OK' },
        put: { description: 'Update user', requestShape: MeShape },
    },
};

function bind(path: string, method: HttpMethod, view: ViewDefinition): BoundView {
    return createView({ path, method, view });
}

describe('LinkCompiler', () => {
    // ── Collection ──

    describe('list and create', () => {
        it('should compile a paginated list', () => {
            const link = compileLink('/pets/', bind('/pets/', 'GET', PetList), CONTEXT);
            expect(link.kind).toBe('link');
            expect(link.url).toBe('/pets/');
            expect(link.action).toBe('get');
            expect(link.description).toBe('Pets');
            expect(link.fields.map(f => f.name)).toEqual(['name', 'page']);
            expect('encoding' in link).toBe(false);
        });

        it('should wrap the list response in the pagination envelope', () => {
            const link = compileLink('/pets/', bind('/pets/', 'GET', PetList), CONTEXT);
            const properties = link.responseSchema.schema?.properties;
            expect(Object.keys(properties ?? {})).toEqual(['results', 'next', 'previous', 'count']);
            expect(properties?.['results']).toEqual({
                type: 'array',
                items: {
                    type: 'object',
                    properties: { id: { type: 'integer' }, name: { type: 'string', description: 'Pet name' } },
                },
            });
        });

        it('should send create fields in the body as JSON', () => {
            const link = compileLink('/pets/', bind('/pets/', 'POST', PetList), CONTEXT);
            expect(link.action).toBe('post');
            expect(link.encoding).toBe('application/json');
            expect(link.fields).toEqual([{
                name: 'name',
                location: 'form',
                required: true,
                schema: { type: 'string', description: 'Pet name' },
                description: 'Pet name',
            }]);
        });

        it('should declare no response for create', () => {
            const link = compileLink('/pets/', bind('/pets/', 'POST', PetList), CONTEXT);
            expect(link.responseSchema).toEqual({});
            expect(link.errorStatusCodes).toEqual({});
        });
    });

    // ── Detail ──

    describe('detail actions', () => {
        it('should describe the path parameter from the model', () => {
            const link = compileLink('/pets/{id}/', bind('/pets/{id}/', 'GET', PetDetail), CONTEXT);
            expect(link.fields[0]).toEqual({
                name: 'id',
                location: 'path',
                required: true,
                schema: {
                    type: 'integer',
                    title: 'ID',
                    description: 'A unique integer value identifying this pet.',
                },
            });
        });

        it('should compile retrieve with filters, response and errors', () => {
            const link = compileLink('/pets/{id}/', bind('/pets/{id}/', 'GET', PetDetail), CONTEXT);
            expect(link.description).toBe('Fetch one pet');
            expect(link.fields.map(f => f.name)).toEqual(['id', 'name', 'search']);
            expect(link.responseSchema).toEqual({ description: 'The pet.', schema: PET_SCHEMA });
            expect(link.errorStatusCodes).toEqual({ '404': { description: 'Pet not found' } });
        });

        it('should make nothing required under PATCH', () => {
            const link = compileLink('/pets/{id}/', bind('/pets/{id}/', 'PATCH', PetDetail), CONTEXT);
            const name = link.fields.find(f => f.name === 'name');
            expect(name?.location).toBe('form');
            expect(name?.required).toBe(false);
            expect(link.encoding).toBe('application/json');
        });

        it('should not set an encoding for DELETE', () => {
            const link = compileLink('/pets/{id}/', bind('/pets/{id}/', 'DELETE', PetDetail), CONTEXT);
            expect(link.action).toBe('delete');
            expect('encoding' in link).toBe(false);
            expect(link.fields.map(f => f.name)).toEqual(['id', 'name', 'search']);
        });
    });

    // ── Encoding ──

    describe('encoding', () => {
        const Upload = defineShape('Upload', { fields: { photo: field.file(), caption: field.string() } });

        it('should prefer multipart for file uploads when accepted', () => {
            const view: ViewDefinition = {
                methods: ['POST'],
                serializer: Upload,
                parsers: ['application/json', 'multipart/form-data'],
            };
            expect(compileLink('/photos/', bind('/photos/', 'POST', view), CONTEXT).encoding)
                .toBe('multipart/form-data');
        });

        it('should use the first parser otherwise', () => {
            const view: ViewDefinition = {
                methods: ['POST'],
                serializer: Upload,
                parsers: ['application/x-www-form-urlencoded'],
            };
            expect(compileLink('/photos/', bind('/photos/', 'POST', view), CONTEXT).encoding)
                .toBe('application/x-www-form-urlencoded');
        });
    });

    // ── Filters ──

    describe('filter fields', () => {
        const view: ViewDefinition = { methods: ['GET', 'POST'], filterBackends: [searchBackend] };

        it('should apply to reads on plain views', () => {
            const link = compileLink('/pets/', bind('/pets/', 'GET', view), CONTEXT);
            expect(link.fields).toEqual([SEARCH]);
        });

        it('should not apply to create', () => {
            const link = compileLink('/pets/', bind('/pets/', 'POST', view), CONTEXT);
            expect(link.fields).toEqual([]);
        });
    });

    // ── Versioned shapes ──

    describe('versioned shapes', () => {
        it('should resolve the response shape for the runtime version', () => {
            const events: DebugEvent[] = [];
            const link = compileLink('/me/', bind('/me/', 'GET', MeView), {
                documentVersion: '1.0',
                runtimeVersion: '1.5',
                debug: event => { events.push(event); },
            });

            expect(link.responseSchema).toEqual({
                description: 'OK',
                schema: { type: 'object', properties: { username: { type: 'string' } }, required: ['username'] },
            });
            expect(events).toEqual([expect.objectContaining({
                type: 'version',
                path: '/me/',
                method: 'GET',
                role: 'response',
                requestedVersion: '1.5',
                constraint: '>1.3, <=1.6',
                shape: 'MeV16',
            })]);
        });

        it('should append the response documentation to the description', () => {
            const link = compileLink('/me/', bind('/me/', 'GET', MeView), { ...CONTEXT, runtimeVersion: '1.5' });
            expect(link.description).toBe(
                'Current user\n\n**Response Description:**\nThe user.\nFields vary by version.',
            );
        });

        it('should resolve the request shape and append its documentation', () => {
            const link = compileLink('/me/', bind('/me/', 'PUT', MeView), { ...CONTEXT, runtimeVersion: '1.7' });
            expect(link.fields.map(f => f.name)).toEqual(['username', 'email']);
            expect(link.description).toBe(
                'Update user\n\n**Request Description:**\nThe user.\nFields vary by version.',
            );
            expect(link.responseSchema).toEqual({});
        });

        it('should propagate an unsupported version', () => {
            expect(() => compileLink('/me/', bind('/me/', 'GET', MeView), { ...CONTEXT, runtimeVersion: '1.3' }))
                .toThrow(NoMatchingVersionError);
        });
    });

    // ── URL ──

    describe('url', () => {
        it('should substitute the document version and skip it as a parameter', () => {
            const view: ViewDefinition = { methods: ['GET'], actions: { GET: 'list' } };
            const link = compileLink('/v{version}/pets/', bind('/v{version}/pets/', 'GET', view), {
                documentVersion: '2.0',
                runtimeVersion: '2.0',
            });
            expect(link.url).toBe('/v2.0/pets/');
            expect(link.fields).toEqual([]);
        });
    });

    // ── Path fields ──

    describe('getPathFields()', () => {
        function pathSchema(view: Partial<ViewDefinition>, path = '/pets/{id}/') {
            return getPathFields(path, bind(path, 'GET', { methods: ['GET'], ...view }))[0]?.schema;
        }

        it('should default to a plain string', () => {
            expect(getPathFields('/pets/{id}/', bind('/pets/{id}/', 'GET', { methods: ['GET'] }))).toEqual([
                { name: 'id', location: 'path', required: true, schema: { type: 'string' } },
            ]);
        });

        it('should describe a UUID primary key', () => {
            const model: ModelMeta = { name: 'pet', fields: { id: { primaryKey: true, type: 'uuid' } } };
            expect(pathSchema({ model })).toEqual({
                type: 'string',
                description: 'A UUID string identifying this pet.',
            });
        });

        it('should prefer help text over the generated description', () => {
            const model: ModelMeta = {
                name: 'pet',
                fields: { id: { primaryKey: true, type: 'auto', helpText: 'Internal id' } },
            };
            expect(pathSchema({ model })).toEqual({ type: 'integer', description: 'Internal id' });
        });

        it('should apply the lookup pattern to the lookup field', () => {
            expect(pathSchema({ lookupField: 'id', lookupValueRegex: '[0-9]+', model: petModel })).toEqual({
                type: 'string',
                pattern: '[0-9]+',
                title: 'ID',
                description: 'A unique integer value identifying this pet.',
            });
        });

        it('should only title a non-key model field', () => {
            const model: ModelMeta = { name: 'pet', fields: { slug: { verboseName: 'Slug' } } };
            expect(pathSchema({ model }, '/pets/{slug}/')).toEqual({ type: 'string', title: 'Slug' });
        });

        it('should list each variable once', () => {
            const fields = getPathFields('/a/{id}/b/{id}/{ref}/', bind('/a/', 'GET', { methods: ['GET'] }));
            expect(fields.map(f => f.name)).toEqual(['id', 'ref']);
        });
    });

    describe('pkDescription()', () => {
        it('should fall back to the model name and a generic value', () => {
            expect(pkDescription({ name: 'Pet', fields: {} }, { type: 'other' })).toBe(
                'A unique value identifying this Pet.',
            );
        });
    });

    describe('shapeDoc()', () => {
        it('should trim every line', () => {
            expect(shapeDoc('  first\n   second  ')).toBe('first\nsecond');
            expect(shapeDoc(undefined)).toBe('');
        });
    });
});
