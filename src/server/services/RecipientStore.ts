/**
 * /src/server/services/RecipientStore.ts
 *
 * Persists the alert recipient list as a flat UTF-8 file, one address per line.
 * The file is re-read on every query and rewritten wholesale on every change.
 * Writers are not serialized; concurrent updates resolve to the last write.
 */

import fs from 'fs';
import type { IRecipientStore } from '../../shared/contracts/interfaces';
import type {
  AddRecipientErrorCode,
  ClearRecipientsErrorCode,
  OperationResult,
  RemoveRecipientErrorCode,
  SaveRecipientsErrorCode,
} from '../../shared/models/dto';
import { Validation } from '../validation/validationRules';
import { errorCode, errorMessage } from '../utils/errorDetails';
import type { ILogger } from '../utils/ScopedLogger';

const sameAddress = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

/** Case-insensitive dedup keeping the first occurrence, then a stable case-insensitive sort. */
export function normalizeRecipients(addresses: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const address of addresses) {
    const key = address.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(address);
  }
  return unique.sort((a, b) => {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

export class RecipientStore implements IRecipientStore {
  private readonly filePath: string;
  private readonly logger: ILogger;

  constructor(deps: { filePath: string; logger: ILogger }) {
    this.filePath = deps.filePath;
    this.logger = deps.logger;
  }

  /**
   * Reads the file and keeps trimmed, non-blank lines that pass validate().
   * Order is the file's order; no dedup. Never throws: missing or unreadable → [].
   */
  async load(): Promise<string[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, { encoding: 'utf-8' });
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        this.logger.error(`Error reading recipient file: ${errorMessage(err)}`);
      }
      return [];
    }
    return raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && this.validate(line));
  }

  validate(address: string): boolean {
    return Validation.email.test(address);
  }

  async save(addresses: string[]): Promise<OperationResult<string[], SaveRecipientsErrorCode>> {
    const normalized = normalizeRecipients(addresses);
    try {
      await fs.promises.writeFile(this.filePath, normalized.join('\n'), { encoding: 'utf-8' });
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Error saving recipient file: ${message}`);
      return { ok: false, error: { kind: 'persistence', code: 'write_failed', message } };
    }
    this.logger.info(`Updated recipient list: ${normalized.length} recipients`);
    return { ok: true, value: normalized };
  }

  add(address: string, current: string[]): OperationResult<string[], AddRecipientErrorCode> {
    if (!this.validate(address)) {
      return {
        ok: false,
        error: { kind: 'validation', code: 'invalid_email', message: `Invalid email format: ${address}` },
      };
    }
    if (current.some((existing) => sameAddress(existing, address))) {
      return {
        ok: false,
        error: {
          kind: 'validation',
          code: 'already_present',
          message: `${address} is already in the recipient list.`,
        },
      };
    }
    return { ok: true, value: [...current, address] };
  }

  remove(address: string, current: string[]): OperationResult<string[], RemoveRecipientErrorCode> {
    const remaining = current.filter((existing) => !sameAddress(existing, address));
    if (remaining.length < current.length) {
      return { ok: true, value: remaining };
    }
    return {
      ok: false,
      error: { kind: 'not_found', code: 'not_found', message: `${address} was not found in the recipient list.` },
    };
  }

  async clear(): Promise<OperationResult<void, ClearRecipientsErrorCode>> {
    try {
      await fs.promises.unlink(this.filePath);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        return {
          ok: false,
          error: { kind: 'not_found', code: 'not_found', message: 'No recipient list found to delete.' },
        };
      }
      const message = errorMessage(err);
      this.logger.error(`Error deleting recipient file: ${message}`);
      return { ok: false, error: { kind: 'persistence', code: 'delete_failed', message } };
    }
    this.logger.info('Recipient list deleted');
    return { ok: true, value: undefined };
  }
}
