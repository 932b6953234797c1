import { describe, it, beforeEach, afterEach, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { RecipientStore, normalizeRecipients } from '../src/server/services/RecipientStore';
import { ScopedLogger } from '../src/server/utils/ScopedLogger';
import { recordingLogger } from './helpers/http';

describe('RecipientStore', () => {
  let dir: string;
  let filePath: string;
  let store: RecipientStore;

  const readFile = (): string => fs.readFileSync(filePath, { encoding: 'utf-8' });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'recipients-'));
    filePath = path.join(dir, 'clients.txt');
    store = new RecipientStore({ filePath, logger: new ScopedLogger('', false) });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('validate', () => {
    it.each([
      'user@example.com',
      'first.last+tag@sub.example.co',
      'a_b%c-d@x-y.io',
      'UPPER@EXAMPLE.ORG',
    ])('accepts %s', (address) => {
      expect(store.validate(address)).toBe(true);
    });

    it.each([
      '',
      'user@example',
      'user@example.c',
      '@example.com',
      'user example@x.com',
      'user@exa mple.com',
      'user@example.c0m',
      ' user@example.com',
      'user@@example.com',
      'user!@example.com',
    ])('rejects %j', (address) => {
      expect(store.validate(address)).toBe(false);
    });
  });

  describe('load', () => {
    it('returns [] when the file does not exist', async () => {
      await expect(store.load()).resolves.toEqual([]);
    });

    it('trims lines and drops blank and malformed ones, keeping file order', async () => {
      fs.writeFileSync(filePath, 'b@x.com\n\n  A@x.com  \nnot-an-email\r\nb@x.com\n   \n');
      await expect(store.load()).resolves.toEqual(['b@x.com', 'A@x.com', 'b@x.com']);
    });

    it('logs and returns [] when the path cannot be read as a file', async () => {
      const logger = recordingLogger();
      const dirStore = new RecipientStore({ filePath: dir, logger });
      await expect(dirStore.load()).resolves.toEqual([]);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('save', () => {
    it('sorts case-insensitively with no trailing newline', async () => {
      const result = await store.save(['b@x.com', 'A@x.com']);
      expect(result).toEqual({ ok: true, value: ['A@x.com', 'b@x.com'] });
      expect(readFile()).toBe('A@x.com\nb@x.com');
    });

    it('deduplicates case-insensitively keeping the first occurrence', async () => {
      await store.save(['a@x.com', 'c@x.com', 'A@x.com']);
      expect(readFile()).toBe('a@x.com\nc@x.com');
    });

    it('is idempotent over load', async () => {
      fs.writeFileSync(filePath, 'zed@x.com\nAmy@x.com\nbad line\namy@x.com\nbob@x.com\n');
      await store.save(await store.load());
      const first = readFile();
      await store.save(await store.load());
      expect(readFile()).toBe(first);
      expect(first).toBe('Amy@x.com\nbob@x.com\nzed@x.com');
    });

    it('reports a persistence error instead of throwing when the write fails', async () => {
      const logger = recordingLogger();
      const broken = new RecipientStore({ filePath: path.join(dir, 'missing', 'clients.txt'), logger });
      const result = await broken.save(['a@x.com']);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('persistence');
        expect(result.error.code).toBe('write_failed');
      }
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('add', () => {
    it('appends a valid new address without mutating the input', () => {
      const current = ['a@x.com'];
      expect(store.add('b@x.com', current)).toEqual({ ok: true, value: ['a@x.com', 'b@x.com'] });
      expect(current).toEqual(['a@x.com']);
    });

    it('rejects a malformed address', () => {
      expect(store.add('nope', [])).toEqual({
        ok: false,
        error: { kind: 'validation', code: 'invalid_email', message: 'Invalid email format: nope' },
      });
    });

    it('rejects an address already present in another case', () => {
      expect(store.add('A@X.COM', ['a@x.com'])).toEqual({
        ok: false,
        error: {
          kind: 'validation',
          code: 'already_present',
          message: 'A@X.COM is already in the recipient list.',
        },
      });
    });

    it('leaves the stored set unchanged on a second add of the same address', async () => {
      const first = store.add('ops@x.com', await store.load());
      expect(first.ok).toBe(true);
      if (first.ok) await store.save(first.value);
      const before = readFile();

      const second = store.add('OPS@x.com', await store.load());
      expect(second.ok).toBe(false);
      if (!second.ok) expect(second.error.code).toBe('already_present');
      expect(readFile()).toBe(before);
    });
  });

  describe('remove', () => {
    it('removes every case-insensitive match', () => {
      expect(store.remove('a@x.com', ['A@x.com', 'b@x.com'])).toEqual({ ok: true, value: ['b@x.com'] });
    });

    it('reports not found and leaves the file unchanged', async () => {
      await store.save(['a@x.com']);
      const result = store.remove('zz@x.com', await store.load());
      expect(result).toEqual({
        ok: false,
        error: { kind: 'not_found', code: 'not_found', message: 'zz@x.com was not found in the recipient list.' },
      });
      expect(readFile()).toBe('a@x.com');
    });
  });

  describe('clear', () => {
    it('deletes the backing file', async () => {
      await store.save(['a@x.com']);
      await expect(store.clear()).resolves.toEqual({ ok: true, value: undefined });
      expect(fs.existsSync(filePath)).toBe(false);
      await expect(store.load()).resolves.toEqual([]);
    });

    it('reports not found when there is nothing to delete', async () => {
      await expect(store.clear()).resolves.toEqual({
        ok: false,
        error: { kind: 'not_found', code: 'not_found', message: 'No recipient list found to delete.' },
      });
    });
  });
});

describe('normalizeRecipients', () => {
  it('returns a new sorted, deduplicated array', () => {
    const input = ['c@x.com', 'B@x.com', 'a@x.com', 'b@x.com'];
    expect(normalizeRecipients(input)).toEqual(['a@x.com', 'B@x.com', 'c@x.com']);
    expect(input).toEqual(['c@x.com', 'B@x.com', 'a@x.com', 'b@x.com']);
  });
});
