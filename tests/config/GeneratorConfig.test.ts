import { describe, it, expect } from 'vitest';
import { mergeConfig, DEFAULT_CONFIG } from '../../src/config/GeneratorConfig.js';

// ============================================================================
// GeneratorConfig Tests
// ============================================================================

describe('GeneratorConfig', () => {
    // ── Default Config ──

    describe('DEFAULT_CONFIG', () => {
        it('should document version 1.0', () => {
            expect(DEFAULT_CONFIG.version).toBe('1.0');
        });

        it('should coerce pk path variables by default', () => {
            expect(DEFAULT_CONFIG.coercePathPk).toBe(true);
        });

        it('should treat PATCH as the only partial update', () => {
            expect(DEFAULT_CONFIG.partialUpdateMethods).toEqual(['PATCH']);
        });

        it('should leave the header fields unset', () => {
            expect(DEFAULT_CONFIG.title).toBeUndefined();
            expect(DEFAULT_CONFIG.url).toBeUndefined();
        });
    });

    // ── mergeConfig ──

    describe('mergeConfig()', () => {
        it('should return defaults for empty partial', () => {
            expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
        });

        it('should override individual values', () => {
            const config = mergeConfig({ version: '2.1', coercePathPk: false });
            expect(config.version).toBe('2.1');
            expect(config.coercePathPk).toBe(false);
            expect(config.partialUpdateMethods).toEqual(['PATCH']); // unchanged
        });

        it('should carry the header fields', () => {
            const config = mergeConfig({
                title: 'Pet API',
                description: 'Everything about pets',
                url: 'https://api.example.test/',
            });
            expect(config).toMatchObject({
                title: 'Pet API',
                description: 'Everything about pets',
                url: 'https://api.example.test/',
            });
        });

        it('should not add keys for absent header fields', () => {
            expect('title' in mergeConfig({ version: '3.0' })).toBe(false);
        });
    });
});
