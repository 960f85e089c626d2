import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SqliteInvoiceStore } from '../../apps/api/src/services/invoices/store';
import { seedInvoicesIfEmpty } from '../../apps/api/src/services/invoices/seed';
import { loadChunkCorpus } from '../../apps/api/src/services/document-index/loader';
import { SAMPLE_INVOICES } from '../fixtures/invoices';

describe('Startup data', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-auditor-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeJson = (name: string, value: unknown): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, JSON.stringify(value));
    return file;
  };

  describe('seedInvoicesIfEmpty', () => {
    it('seeds an empty store once', async () => {
      const store = new SqliteInvoiceStore(':memory:');
      const seedPath = writeJson('invoices.json', SAMPLE_INVOICES.slice(0, 2));
      try {
        expect(await seedInvoicesIfEmpty(store, seedPath)).toBe(2);
        expect(await seedInvoicesIfEmpty(store, seedPath)).toBe(0);
        expect(await store.count()).toBe(2);
      } finally {
        store.close();
      }
    });

    it('skips a missing seed file', async () => {
      const store = new SqliteInvoiceStore(':memory:');
      try {
        expect(await seedInvoicesIfEmpty(store, path.join(dir, 'missing.json'))).toBe(0);
      } finally {
        store.close();
      }
    });

    it('rejects records that fail validation', async () => {
      const store = new SqliteInvoiceStore(':memory:');
      const seedPath = writeJson('invoices.json', [{ ...SAMPLE_INVOICES[0], status: 'Lost' }]);
      try {
        await expect(seedInvoicesIfEmpty(store, seedPath)).rejects.toThrow(`Invalid invoice seed file ${seedPath}`);
        expect(await store.count()).toBe(0);
      } finally {
        store.close();
      }
    });

    it('creates the database directory for a file path', async () => {
      const dbPath = path.join(dir, 'nested', 'ledger.db');
      const store = new SqliteInvoiceStore(dbPath);
      try {
        expect(fs.existsSync(dbPath)).toBe(true);
      } finally {
        store.close();
      }
    });
  });

  describe('loadChunkCorpus', () => {
    it('reads chunks and defaults metadata', () => {
      const corpusPath = writeJson('corpus.json', [
        { content: 'Audit finding one', metadata: { source: 'audit.pdf', page: 2 } },
        { content: 'Audit finding two' },
      ]);
      expect(loadChunkCorpus(corpusPath)).toEqual([
        { content: 'Audit finding one', metadata: { source: 'audit.pdf', page: 2 } },
        { content: 'Audit finding two', metadata: {} },
      ]);
    });

    it('treats a missing file as an empty corpus', () => {
      expect(loadChunkCorpus(path.join(dir, 'missing.json'))).toEqual([]);
    });

    it('rejects malformed chunks', () => {
      const corpusPath = writeJson('corpus.json', [{ text: 'wrong field' }]);
      expect(() => loadChunkCorpus(corpusPath)).toThrow(`Invalid chunk corpus ${corpusPath}`);
    });
  });
});
