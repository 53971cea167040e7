import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ZodError } from 'zod';
import { createConfig, loadConfig } from '../../../src/config/config.js';
import { DEFAULT_CONFIG, SiteConfigSchema } from '../../../src/config/schema.js';

describe('configuration', () => {
  describe('defaults', () => {
    it('should default to a local backend without vector search', () => {
      expect(DEFAULT_CONFIG.backend).toMatchObject({
        baseUrl: 'http://localhost:8983/solr',
        timeoutMs: 5000,
        vectorEnabled: false,
        lexicalHandler: 'mlt',
        nativeHandler: 'smlt',
        jsonNl: 'map',
      });
      expect(DEFAULT_CONFIG.sites).toEqual([]);
      expect(DEFAULT_CONFIG.routing.defaultRootContainerId).toBe(1);
    });

    it('should skip structural nodes during bulk runs', () => {
      expect(DEFAULT_CONFIG.bulk).toEqual({
        excludedKinds: ['folder', 'recycler', 'separator'],
        delayMs: 0,
      });
    });
  });

  describe('loadConfig', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'likewise-config-'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    function writeConfig(content: unknown): string {
      const path = join(tempDir, 'likewise.config.json');
      writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
      return path;
    }

    it('should read overrides from the environment', () => {
      const config = loadConfig({
        skipFile: true,
        env: {
          LIKEWISE_BACKEND_URL: 'http://solr.test:8983/solr',
          LIKEWISE_BACKEND_TIMEOUT_MS: '2500',
          LIKEWISE_BACKEND_VECTOR_ENABLED: 'true',
          LIKEWISE_BACKEND_PASSWORD: 'test-secret',
          LIKEWISE_LOG_PRETTY: 'FALSE',
          LIKEWISE_BULK_DELAY_MS: '250',
        },
      });

      expect(config.backend.baseUrl).toBe('http://solr.test:8983/solr');
      expect(config.backend.timeoutMs).toBe(2500);
      expect(config.backend.vectorEnabled).toBe(true);
      expect(config.backend.password).toBe('test-secret');
      expect(config.logging.pretty).toBe(false);
      expect(config.bulk.delayMs).toBe(250);
    });

    it('should ignore empty environment values', () => {
      const config = loadConfig({ skipFile: true, env: { LIKEWISE_BACKEND_URL: '' } });
      expect(config.backend.baseUrl).toBe('http://localhost:8983/solr');
    });

    it('should read sites and settings from a file', () => {
      const configPath = writeConfig({
        sites: [{ identifier: 'main', rootContainerId: 1, cores: { '0': 'core_en' } }],
        settings: { similarityMode: 'hybrid', maxResults: 4 },
      });

      const config = loadConfig({ configPath, skipEnv: true });

      expect(config.sites).toEqual([{ identifier: 'main', rootContainerId: 1, cores: { '0': 'core_en' } }]);
      expect(config.settings).toEqual({ similarityMode: 'hybrid', maxResults: 4 });
      expect(config.backend.lexicalHandler).toBe('mlt');
    });

    it('should find the file by searching from a directory', () => {
      writeConfig({ backend: { vectorEnabled: true } });
      expect(loadConfig({ searchDir: tempDir, skipEnv: true }).backend.vectorEnabled).toBe(true);
    });

    it('should let the environment win over the file and overrides win over both', () => {
      const configPath = writeConfig({ backend: { timeoutMs: 3000, lexicalHandler: 'select' } });

      const fromEnv = loadConfig({ configPath, env: { LIKEWISE_BACKEND_TIMEOUT_MS: '4000' } });
      expect(fromEnv.backend.timeoutMs).toBe(4000);
      expect(fromEnv.backend.lexicalHandler).toBe('select');

      const overridden = loadConfig({
        configPath,
        env: { LIKEWISE_BACKEND_TIMEOUT_MS: '4000' },
        overrides: { backend: { timeoutMs: 6000 } },
      });
      expect(overridden.backend.timeoutMs).toBe(6000);
    });

    it('should reject out-of-range values', () => {
      expect(() =>
        loadConfig({ skipFile: true, env: { LIKEWISE_BACKEND_TIMEOUT_MS: '50' } })
      ).toThrow(ZodError);
    });

    it('should report a malformed file', () => {
      const configPath = writeConfig('{ not json');
      expect(() => loadConfig({ configPath, skipEnv: true })).toThrow(
        `Failed to load configuration from ${configPath}`
      );
    });

    it('should reject a file that is not an object', () => {
      const configPath = writeConfig([1, 2]);
      expect(() => loadConfig({ configPath, skipEnv: true })).toThrow('expected a JSON object');
    });
  });

  it('should create a configuration from overrides', () => {
    const config = createConfig({ bulk: { delayMs: 100 } });
    expect(config.bulk).toEqual({ excludedKinds: ['folder', 'recycler', 'separator'], delayMs: 100 });
  });

  it('should require numeric language keys for site cores', () => {
    expect(() =>
      SiteConfigSchema.parse({ identifier: 'main', rootContainerId: 1, cores: { en: 'core_en' } })
    ).toThrow(ZodError);
  });
});
