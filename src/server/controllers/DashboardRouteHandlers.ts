import type { Request, Response, NextFunction } from 'express';
import type {
  IAlertDispatcher,
  IDashboardRouteHandlers,
  IFlashMessages,
  IRecipientStore,
} from '../../shared/contracts/interfaces';
import type { DashboardViewProps } from '../../shared/models/dto';
import { Validation } from '../validation/validationRules';
import { NoCacheHeaderSetter } from '../utils/NoCacheHeaderSetter';

// Form fields arrive as strings from express.urlencoded; anything else counts as empty
function readField(body: unknown, name: string): string {
  if (typeof body !== 'object' || body === null) return '';
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : '';
}

export const RATE_LIMITED_MESSAGE = 'Too many alerts sent. Please wait a minute and try again.';

const normalizeAddressInput = (raw: string): string => raw.trim().toLowerCase();

export class DashboardRouteHandlers implements IDashboardRouteHandlers {
  private recipientStore: IRecipientStore;
  private alertDispatcher: IAlertDispatcher;
  private flash: IFlashMessages;
  private senderAddress: string;

  constructor(deps: {
    recipientStore: IRecipientStore;
    alertDispatcher: IAlertDispatcher;
    flash: IFlashMessages;
    senderAddress: string;
  }) {
    this.recipientStore = deps.recipientStore;
    this.alertDispatcher = deps.alertDispatcher;
    this.flash = deps.flash;
    this.senderAddress = deps.senderAddress;
  }

  async handleIndexGet(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const recipients = await this.recipientStore.load();
      const props: DashboardViewProps = {
        title: 'Alert Dashboard',
        sender: this.senderAddress,
        recipients,
        flashes: this.flash.consume(req),
        csrfToken: typeof req.csrfToken === 'function' ? req.csrfToken() : undefined,
        maxMessageLength: Validation.alert.maxLength,
      };
      NoCacheHeaderSetter.set(res);
      res.render('index', props);
    } catch (err) {
      next(err);
    }
  }

  async handleSendAlertPost(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.alertDispatcher.send(readField(req.body, 'error'));
      if (result.ok) {
        this.flash.push(req, 'success', `Alert sent successfully to ${result.value.recipientCount} recipient(s)!`);
      } else if (result.error.kind === 'transport') {
        this.flash.push(req, 'error', `Failed to send email: ${result.error.message}`);
      } else {
        this.flash.push(req, 'error', `Error: ${result.error.message}`);
      }
      res.redirect(303, '/');
    } catch (err) {
      next(err);
    }
  }

  // Answers a send-alert request rejected by the rate limiter
  handleAlertRateLimited(req: Request, res: Response): void {
    this.flash.push(req, 'error', RATE_LIMITED_MESSAGE);
    res.redirect(303, '/');
  }

  /**
   * Accepts `new_email` and/or `remove_email`; the add is applied first, then the remove,
   * against one freshly loaded list. The file is rewritten once if either changed it.
   */
  async handleUpdateClientsPost(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const newEmail = normalizeAddressInput(readField(req.body, 'new_email'));
      const removeEmail = normalizeAddressInput(readField(req.body, 'remove_email'));
      let current = await this.recipientStore.load();
      let changed = false;

      if (newEmail) {
        const added = this.recipientStore.add(newEmail, current);
        if (added.ok) {
          current = added.value;
          changed = true;
          this.flash.push(req, 'success', `Added ${newEmail} to the recipient list.`);
        } else {
          this.flash.push(req, 'error', added.error.message);
        }
      }

      if (removeEmail) {
        const removed = this.recipientStore.remove(removeEmail, current);
        if (removed.ok) {
          current = removed.value;
          changed = true;
          this.flash.push(req, 'success', `Removed ${removeEmail} from the recipient list.`);
        } else {
          this.flash.push(req, 'error', removed.error.message);
        }
      }

      if (changed) {
        const saved = await this.recipientStore.save(current);
        if (!saved.ok) {
          this.flash.push(req, 'error', 'Error saving recipient list. Please try again.');
        }
      }
      res.redirect(303, '/');
    } catch (err) {
      next(err);
    }
  }

  async handleDeleteClientsPost(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const cleared = await this.recipientStore.clear();
      if (cleared.ok) {
        this.flash.push(req, 'success', 'All recipients deleted successfully.');
      } else if (cleared.error.code === 'not_found') {
        this.flash.push(req, 'error', cleared.error.message);
      } else {
        this.flash.push(req, 'error', `Error deleting recipient list: ${cleared.error.message}`);
      }
      res.redirect(303, '/');
    } catch (err) {
      next(err);
    }
  }
}
