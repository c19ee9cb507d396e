import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../../src/config/ConfigLoader.js';
import { DEFAULT_CONFIG } from '../../src/config/GeneratorConfig.js';

// ============================================================================
// ConfigLoader Tests
// ============================================================================

describe('ConfigLoader', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'shapedoc-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    // ── Discovery ──

    describe('discovery', () => {
        it('should fall back to defaults without a config file', () => {
            expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
        });

        it('should auto-detect shapedoc.yaml', () => {
            writeFileSync(join(dir, 'shapedoc.yaml'), 'title: Pet API\nversion: "2.0"\n');
            const config = loadConfig(undefined, dir);
            expect(config.title).toBe('Pet API');
            expect(config.version).toBe('2.0');
        });

        it('should prefer yaml over json', () => {
            writeFileSync(join(dir, 'shapedoc.json'), JSON.stringify({ title: 'From JSON' }));
            writeFileSync(join(dir, 'shapedoc.yml'), 'title: From YAML\n');
            expect(loadConfig(undefined, dir).title).toBe('From YAML');
        });

        it('should read a json file', () => {
            writeFileSync(join(dir, 'shapedoc.json'), JSON.stringify({ coercePathPk: false }));
            expect(loadConfig(undefined, dir).coercePathPk).toBe(false);
        });

        it('should load an explicit path relative to cwd', () => {
            writeFileSync(join(dir, 'custom.yaml'), 'partialUpdateMethods: [PATCH, PUT]\n');
            expect(loadConfig('custom.yaml', dir).partialUpdateMethods).toEqual(['PATCH', 'PUT']);
        });

        it('should fail for a missing explicit path', () => {
            expect(() => loadConfig('missing.yaml', dir)).toThrow('Config file not found');
        });
    });

    // ── Parsing ──

    describe('parsing', () => {
        it('should read an unquoted yaml version as a string', () => {
            writeFileSync(join(dir, 'shapedoc.yaml'), 'version: 1.5\n');
            expect(loadConfig(undefined, dir).version).toBe('1.5');
        });

        it('should treat an empty file as defaults', () => {
            writeFileSync(join(dir, 'shapedoc.yaml'), '');
            expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
        });

        it('should reject a value of the wrong type', () => {
            writeFileSync(join(dir, 'shapedoc.yaml'), 'coercePathPk: maybe\n');
            expect(() => loadConfig(undefined, dir)).toThrow(/Invalid config file ".*shapedoc\.yaml":\n {2}• coercePathPk: /);
        });

        it('should reject unknown keys', () => {
            writeFileSync(join(dir, 'shapedoc.yaml'), 'titel: Typo\n');
            expect(() => loadConfig(undefined, dir)).toThrow('Invalid config file');
        });

        it('should reject an unknown method', () => {
            writeFileSync(join(dir, 'shapedoc.yaml'), 'partialUpdateMethods: [PATCH, FETCH]\n');
            expect(() => loadConfig(undefined, dir)).toThrow('partialUpdateMethods.1');
        });
    });
});
