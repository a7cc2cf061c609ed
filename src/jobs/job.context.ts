import type { Repositories } from '../repositories';
import { EmailMessage, Mailer, MailerNotConfiguredError } from '../utils/email_service';

export interface JobContext {
  repos: Repositories;
  mailer: Mailer;
  now: () => Date;
  clinicName: string;
}

export interface DeliveryResult {
  sent: number;
  failed: number;
}

/**
 * Sends each message on its own. A failed send is logged and skipped; the
 * rest of the batch still goes out. `onSent` runs only after a successful send.
 */
export async function deliverEach(
  ctx: JobContext,
  tag: string,
  messages: EmailMessage[],
  onSent?: (message: EmailMessage, index: number) => Promise<void>
): Promise<DeliveryResult> {
  const result: DeliveryResult = { sent: 0, failed: 0 };

  for (const [index, message] of messages.entries()) {
    try {
      await ctx.mailer(message);
      if (onSent) await onSent(message, index);
      result.sent++;
    } catch (err) {
      result.failed++;
      if (err instanceof MailerNotConfiguredError) {
        console.warn(`[Jobs] ${tag}: ${err.message} - ${message.to} not notified`);
      } else {
        console.error(`[Jobs] ${tag}: sending to ${message.to} failed:`, err);
      }
    }
  }

  return result;
}
