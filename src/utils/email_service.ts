import nodemailer from 'nodemailer';
import { config } from '../config';

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
}

/** Sends one message. Rejects when the transport fails; callers decide whether to continue. */
export type Mailer = (message: EmailMessage) => Promise<void>;

type SmtpSettings = typeof config.smtp;

export class MailerNotConfiguredError extends Error {
  constructor() {
    super('SMTP is not configured');
    this.name = new.target.name;
  }
}

/**
 * SMTP mailer backed by nodemailer. Without SMTP settings every send rejects
 * with MailerNotConfiguredError, so nothing is recorded as delivered.
 */
export function createSmtpMailer(smtp: SmtpSettings = config.smtp): Mailer {
  if (!smtp.host || !smtp.user || !smtp.pass) {
    return async () => {
      throw new MailerNotConfiguredError();
    };
  }

  const transporter = nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    auth: { user: smtp.user, pass: smtp.pass },
    connectionTimeout: smtp.timeoutMs,
    greetingTimeout: smtp.timeoutMs,
    socketTimeout: smtp.timeoutMs,
  });

  return async (message) => {
    await transporter.sendMail({
      from: smtp.from || `${config.clinicName} <${smtp.user}>`,
      to: message.to,
      subject: message.subject,
      text: message.text,
    });
  };
}
