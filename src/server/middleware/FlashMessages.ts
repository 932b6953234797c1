/**
 * Session-backed one-shot status messages, shown once on the next dashboard render.
 */
import type { Request } from 'express';
import type { IFlashMessages } from '../../shared/contracts/interfaces';
import type { FlashCategory, FlashMessage } from '../../shared/models/dto';

export class FlashMessages implements IFlashMessages {
  push(req: Request, category: FlashCategory, message: string): void {
    const queue = req.session.flash ?? [];
    queue.push({ category, message });
    req.session.flash = queue;
  }

  consume(req: Request): FlashMessage[] {
    const queue = req.session.flash ?? [];
    delete req.session.flash;
    return queue;
  }
}
