/**
 * /src/shared/models/dto.ts
 *
 * Type definitions shared by the core services, route handlers and views.
 * Pure types only, no runtime logic.
 */

// Error taxonomy surfaced by core operations (configuration errors are thrown, see config.ts)
export type ErrorKind = 'validation' | 'not_found' | 'persistence' | 'transport';

export type OperationError<C extends string = string> = {
  kind: ErrorKind;
  code: C;
  message: string;
};

export type OperationResult<T, C extends string = string> =
  | { ok: true; value: T }
  | { ok: false; error: OperationError<C> };

// RecipientStore result codes
export type AddRecipientErrorCode = 'invalid_email' | 'already_present';
export type RemoveRecipientErrorCode = 'not_found';
export type SaveRecipientsErrorCode = 'write_failed';
export type ClearRecipientsErrorCode = 'not_found' | 'delete_failed';

// AlertDispatcher result codes
export type DispatchErrorCode =
  | 'empty_message'
  | 'message_too_long'
  | 'no_recipients'
  | 'auth_failed'
  | 'smtp_error'
  | 'unexpected';

export type DispatchReceipt = {
  recipientCount: number;
  messageId: string;
};

// Plain-text email built per send, never persisted
export type OutboundEmail = {
  from: string;
  to: string; // single To header, recipients joined by ", "
  subject: string;
  text: string;
};

export type SenderCredentials = {
  address: string;
  password: string;
};

export type FlashCategory = 'success' | 'error';

export type FlashMessage = {
  category: FlashCategory;
  message: string;
};

// Dashboard SSR view props
export type DashboardViewProps = {
  title: string;
  sender: string;
  recipients: string[];
  flashes: FlashMessage[];
  csrfToken?: string;
  maxMessageLength: number;
};
