import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import {
  clearConfigCache,
  getConfig,
  loadConfig,
  resolveDataPath,
} from '../../apps/api/src/services/config';

const OVERRIDE_VARS = ['CONFIG_PATH', 'LLM_BASE_URL', 'LLM_MODEL', 'DATABASE_PATH', 'EMBEDDINGS_PROVIDER', 'LOG_LEVEL'];

describe('Config Service', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const name of OVERRIDE_VARS) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
    clearConfigCache();
  });

  afterEach(() => {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    clearConfigCache();
  });

  describe('Config Loading', () => {
    it('should load the default config file', () => {
      const config = loadConfig();
      expect(config.llm.baseUrl).toBe('https://api.deepseek.com/v1');
      expect(config.llm.model).toBe('deepseek-chat');
      expect(config.embeddings).toEqual({ provider: 'hashing', model: 'text-embedding-3-small', dimensions: 256 });
      expect(config.retrieval).toEqual({ topK: 5, maxDocumentContextChars: 500 });
      expect(config.database.path).toBe('data/ledger.db');
      expect(config.logging.level).toBe('info');
    });

    it('should cache the loaded config', () => {
      expect(getConfig()).toBe(getConfig());
    });

    it('should resolve a relative CONFIG_PATH', () => {
      process.env.CONFIG_PATH = 'config/default.json';
      expect(loadConfig().data.corpusPath).toBe('data/corpus.json');
    });

    it('should fail on a missing config file', () => {
      process.env.CONFIG_PATH = '/nonexistent/ledger-config.json';
      expect(() => loadConfig()).toThrow('Configuration file not found or invalid: /nonexistent/ledger-config.json');
    });
  });

  describe('Environment Variable Overrides', () => {
    it('should apply string overrides', () => {
      process.env.LLM_BASE_URL = 'http://localhost:11434/v1';
      process.env.LLM_MODEL = 'local-model';
      process.env.DATABASE_PATH = ':memory:';
      const config = loadConfig();
      expect(config.llm.baseUrl).toBe('http://localhost:11434/v1');
      expect(config.llm.model).toBe('local-model');
      expect(config.database.path).toBe(':memory:');
    });

    it('should apply valid enum overrides and ignore invalid ones', () => {
      process.env.EMBEDDINGS_PROVIDER = 'openai';
      process.env.LOG_LEVEL = 'verbose';
      const config = loadConfig();
      expect(config.embeddings.provider).toBe('openai');
      expect(config.logging.level).toBe('info');
    });
  });

  describe('resolveDataPath', () => {
    it('should pass through in-memory and absolute paths', () => {
      expect(resolveDataPath(':memory:')).toBe(':memory:');
      expect(resolveDataPath('/var/data/ledger.db')).toBe('/var/data/ledger.db');
    });

    it('should resolve existing relative paths against the working directory', () => {
      expect(resolveDataPath('data/invoices.json')).toBe(path.resolve(process.cwd(), 'data/invoices.json'));
    });
  });
});
