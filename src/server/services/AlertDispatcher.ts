/**
 * /src/server/services/AlertDispatcher.ts
 *
 * Broadcasts one plain-text alert to every recipient on record.
 * Every recipient is listed in a single To header (no BCC); the SMTP server either
 * accepts the whole envelope or the send fails as a unit. One attempt, no retries.
 */

import type {
  IAlertDispatcher,
  IMailTransport,
  IRecipientStore,
  MailTransportFactory,
} from '../../shared/contracts/interfaces';
import type {
  DispatchErrorCode,
  DispatchReceipt,
  OperationError,
  OperationResult,
  OutboundEmail,
  SenderCredentials,
} from '../../shared/models/dto';
import { Validation } from '../validation/validationRules';
import { createSmtpMailTransport } from './SmtpMailTransport';
import { errorCode, errorMessage, errorResponseCode } from '../utils/errorDetails';
import type { ILogger } from '../utils/ScopedLogger';

const SUBJECT_PREFIX = 'System Alert: ';
const BODY_PREFIX = 'System Alert Notification:\n\n';

// nodemailer's SMTP-level error codes (EAUTH is classified separately)
const SMTP_ERROR_CODES = new Set([
  'ECONNECTION',
  'ETIMEDOUT',
  'ESOCKET',
  'EDNS',
  'ETLS',
  'EPROTOCOL',
  'EENVELOPE',
  'EMESSAGE',
  'ESTREAM',
  'ENOAUTH',
  'EOAUTH2',
]);

const SMTP_AUTH_FAILED = 535;

// Lengths and cuts are in code points so a surrogate pair is never split
const characters = (text: string): string[] => Array.from(text);

export function composeAlertSubject(message: string): string {
  const limit = Validation.alert.subjectPreviewLength;
  const chars = characters(message);
  const preview = chars.slice(0, limit).join('');
  return `${SUBJECT_PREFIX}${preview}${chars.length > limit ? '...' : ''}`;
}

export function composeAlertBody(message: string): string {
  return `${BODY_PREFIX}${message}`;
}

export function composeAlertEmail(message: string, from: string, recipients: string[]): OutboundEmail {
  return {
    from,
    to: recipients.join(', '),
    subject: composeAlertSubject(message),
    text: composeAlertBody(message),
  };
}

export function classifyTransportFailure(err: unknown): OperationError<DispatchErrorCode> {
  const code = errorCode(err);
  const responseCode = errorResponseCode(err);
  if (code === 'EAUTH' || responseCode === SMTP_AUTH_FAILED) {
    return {
      kind: 'transport',
      code: 'auth_failed',
      message: 'Email authentication failed. Please check your Gmail App Password.',
    };
  }
  if ((code !== undefined && SMTP_ERROR_CODES.has(code)) || responseCode !== undefined) {
    return { kind: 'transport', code: 'smtp_error', message: `SMTP error occurred: ${errorMessage(err)}` };
  }
  return {
    kind: 'transport',
    code: 'unexpected',
    message: `Unexpected error sending email: ${errorMessage(err)}`,
  };
}

export class AlertDispatcher implements IAlertDispatcher {
  private readonly sender: SenderCredentials;
  private readonly recipientStore: IRecipientStore;
  private readonly logger: ILogger;
  private readonly transportFactory: MailTransportFactory;

  constructor(deps: {
    sender: SenderCredentials;
    recipientStore: IRecipientStore;
    logger: ILogger;
    transportFactory?: MailTransportFactory;
  }) {
    this.sender = deps.sender;
    this.recipientStore = deps.recipientStore;
    this.logger = deps.logger;
    this.transportFactory = deps.transportFactory ?? createSmtpMailTransport;
  }

  async send(message: string): Promise<OperationResult<DispatchReceipt, DispatchErrorCode>> {
    const text = message.trim();
    if (text.length === 0) {
      return { ok: false, error: { kind: 'validation', code: 'empty_message', message: 'Message cannot be empty.' } };
    }
    if (characters(text).length > Validation.alert.maxLength) {
      return {
        ok: false,
        error: {
          kind: 'validation',
          code: 'message_too_long',
          message: `Message is too long (max ${Validation.alert.maxLength} characters).`,
        },
      };
    }

    const recipients = await this.recipientStore.load();
    if (recipients.length === 0) {
      return {
        ok: false,
        error: {
          kind: 'validation',
          code: 'no_recipients',
          message: 'No recipients configured. Please add recipients first.',
        },
      };
    }

    const email = composeAlertEmail(text, this.sender.address, recipients);

    let transport: IMailTransport | undefined;
    try {
      transport = this.transportFactory(this.sender);
      const { messageId } = await transport.sendMail(email);
      this.logger.info(`Email sent successfully to ${recipients.length} recipient(s)`);
      return { ok: true, value: { recipientCount: recipients.length, messageId } };
    } catch (err) {
      const failure = classifyTransportFailure(err);
      this.logger.error(`Email send error (${failure.code}): ${errorMessage(err)}`);
      return { ok: false, error: failure };
    } finally {
      transport?.close();
    }
  }
}
