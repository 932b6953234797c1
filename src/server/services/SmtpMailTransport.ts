/**
 * Thin nodemailer wrapper: one instance is one implicit-TLS SMTP session
 * against the Gmail submission endpoint. No pooling; callers close() after sending.
 */
import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { IMailTransport, MailTransportFactory } from '../../shared/contracts/interfaces';
import type { OutboundEmail, SenderCredentials } from '../../shared/models/dto';

export const SMTP_HOST = 'smtp.gmail.com';
export const SMTP_PORT = 465;

export class SmtpMailTransport implements IMailTransport {
  private readonly transport: Transporter<SMTPTransport.SentMessageInfo>;

  constructor(sender: SenderCredentials) {
    this.transport = nodemailer.createTransport({
      host: SMTP_HOST,
      port: SMTP_PORT,
      secure: true,
      auth: { user: sender.address, pass: sender.password },
    });
  }

  async sendMail(email: OutboundEmail): Promise<{ messageId: string }> {
    const info = await this.transport.sendMail({
      from: email.from,
      to: email.to,
      subject: email.subject,
      text: email.text,
    });
    return { messageId: info.messageId };
  }

  close(): void {
    this.transport.close();
  }
}

export const createSmtpMailTransport: MailTransportFactory = (sender) => new SmtpMailTransport(sender);
