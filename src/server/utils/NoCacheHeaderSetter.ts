/**
 * /src/server/utils/NoCacheHeaderSetter.ts
 *
 * Sets no-store headers so the dashboard always reflects the current recipient file.
 */
import type { Response } from 'express';

export class NoCacheHeaderSetter {
  static set(res: Pick<Response, 'setHeader'>): void {
    res.setHeader('Cache-Control', 'no-store, max-age=0');
    res.setHeader('Pragma', 'no-cache');
  }
}
