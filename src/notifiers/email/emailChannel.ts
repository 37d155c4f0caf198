/**
 * EmailChannel — SMTP alerts through nodemailer
 *
 * `send` mails one posting; `sendBatch` mails a single digest, so a batch
 * is either fully delivered or not at all.
 */

import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import type { NotificationChannel } from "@/interfaces";
import type { EmailChannelConfig, Logger, Posting } from "@/types";
import { EMAIL_CHANNEL_NAME } from "@/constants";
import {
  formatDigestHtml,
  formatDigestSubject,
  formatDigestText,
  formatPostingEmailHtml,
  formatPostingSubject,
  formatPostingText,
} from "../formatting";

/**
 * The part of a nodemailer transporter the channel uses
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export type EmailChannelDeps = {
  logger: Logger;
  /** Replaces the SMTP transporter (tests) */
  transport?: MailTransport;
};

type EmailContent = {
  subject: string;
  text: string;
  html: string;
};

export class EmailChannel implements NotificationChannel {
  readonly name = EMAIL_CHANNEL_NAME;
  private readonly config: EmailChannelConfig;
  private readonly transport: MailTransport | null;
  private readonly logger: Logger;

  constructor(config: EmailChannelConfig, deps: EmailChannelDeps) {
    this.config = config;
    this.logger = deps.logger.child({ channel: this.name });

    if (!config.enabled) {
      this.transport = null;
    } else {
      this.transport =
        deps.transport ??
        nodemailer.createTransport({
          host: config.smtpHost,
          port: config.smtpPort,
          secure: config.secure,
          auth: {
            user: config.senderEmail,
            pass: config.senderPassword,
          },
        });
    }
  }

  private isConfigured(): boolean {
    return Boolean(
      this.config.senderEmail &&
        this.config.senderPassword &&
        this.config.recipientEmail,
    );
  }

  private async deliver(content: EmailContent): Promise<boolean> {
    if (!this.transport) {
      this.logger.debug("Email notifications disabled");
      return false;
    }

    if (!this.isConfigured()) {
      this.logger.error("Email configuration incomplete");
      return false;
    }

    try {
      await this.transport.sendMail({
        from: this.config.senderEmail,
        to: this.config.recipientEmail,
        subject: content.subject,
        text: content.text,
        html: content.html,
      });
      this.logger.info("Email notification sent", {
        recipient: this.config.recipientEmail,
        subject: content.subject,
      });
      return true;
    } catch (err) {
      this.logger.error("Failed to send email", {
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  async send(posting: Posting): Promise<boolean> {
    return this.deliver({
      subject: formatPostingSubject(posting),
      text: formatPostingText(posting),
      html: formatPostingEmailHtml(posting),
    });
  }

  async sendBatch(postings: readonly Posting[]): Promise<number> {
    if (postings.length === 0) {
      return 0;
    }

    const delivered = await this.deliver({
      subject: formatDigestSubject(postings.length),
      text: formatDigestText(postings),
      html: formatDigestHtml(postings),
    });

    return delivered ? postings.length : 0;
  }
}
