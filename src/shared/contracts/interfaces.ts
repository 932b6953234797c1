/**
 * Interfaces and DI contracts shared across the server modules.
 * Services are wired against these in ApplicationBootstrapper; tests substitute fakes.
 */
import type { Request, Response, NextFunction } from 'express';
import type {
  AddRecipientErrorCode,
  ClearRecipientsErrorCode,
  DispatchErrorCode,
  DispatchReceipt,
  FlashCategory,
  FlashMessage,
  OperationResult,
  OutboundEmail,
  RemoveRecipientErrorCode,
  SaveRecipientsErrorCode,
  SenderCredentials,
} from '../models/dto';

// IRecipientStore: flat-file recipient list persistence
export interface IRecipientStore {
  load(): Promise<string[]>;
  validate(address: string): boolean;
  save(addresses: string[]): Promise<OperationResult<string[], SaveRecipientsErrorCode>>;
  add(address: string, current: string[]): OperationResult<string[], AddRecipientErrorCode>;
  remove(address: string, current: string[]): OperationResult<string[], RemoveRecipientErrorCode>;
  clear(): Promise<OperationResult<void, ClearRecipientsErrorCode>>;
}

// IAlertDispatcher: one broadcast email per call
export interface IAlertDispatcher {
  send(message: string): Promise<OperationResult<DispatchReceipt, DispatchErrorCode>>;
}

// IMailTransport: a single SMTP session; closed after one send
export interface IMailTransport {
  sendMail(email: OutboundEmail): Promise<{ messageId: string }>;
  close(): void;
}

export type MailTransportFactory = (sender: SenderCredentials) => IMailTransport;

// IFlashMessages: session-backed one-shot status messages
export interface IFlashMessages {
  push(req: Request, category: FlashCategory, message: string): void;
  consume(req: Request): FlashMessage[];
}

// IDashboardRouteHandlers: the web-facing operations
export interface IDashboardRouteHandlers {
  handleIndexGet(req: Request, res: Response, next: NextFunction): Promise<void>;
  handleSendAlertPost(req: Request, res: Response, next: NextFunction): Promise<void>;
  handleUpdateClientsPost(req: Request, res: Response, next: NextFunction): Promise<void>;
  handleDeleteClientsPost(req: Request, res: Response, next: NextFunction): Promise<void>;
  handleAlertRateLimited(req: Request, res: Response): void;
}

// IErrorMiddleware: 404 + terminal error handler for Express
export interface IErrorMiddleware {
  handleNotFound(req: Request, res: Response): void;
  handleError(err: unknown, req: Request, res: Response, next: NextFunction): void;
}
