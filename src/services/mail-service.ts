import fs from "fs/promises";
import path from "path";
import nodemailer from "nodemailer";
import type Mail from "nodemailer/lib/mailer";
import { MailConfig } from "../config/config";
import type { Result } from "../types";
import { err, ok } from "../types";
import { MailError } from "../utils/errors";

/**
 * The part of a nodemailer transporter the service uses
 */
export interface MailTransport {
  sendMail(options: Mail.Options): Promise<{ messageId?: string }>;
}

/**
 * A composed report message
 */
export interface ReportMessage {
  to: string[];
  subject: string;
  html: string;
}

/**
 * Creates the SMTP transporter described by the mail configuration
 */
export function createSmtpTransport(config: MailConfig): MailTransport {
  const { host, port, secure, user, password } = config.smtp;
  return nodemailer.createTransport({
    host,
    port,
    secure,
    auth: user ? { user, pass: password ?? "" } : undefined,
  });
}

/**
 * Service responsible for handing report messages to mail transport
 */
export class MailService {
  private readonly transport: MailTransport;

  constructor(
    private readonly config: MailConfig,
    transport?: MailTransport
  ) {
    this.transport = transport ?? createSmtpTransport(config);
  }

  private toMailOptions(message: ReportMessage): Mail.Options {
    return {
      from: this.config.from,
      to: message.to.join(", "),
      subject: message.subject,
      html: message.html,
    };
  }

  /**
   * Sends a message through the configured transport
   * @returns The message id reported by the transport
   */
  async send(message: ReportMessage): Promise<Result<string, MailError>> {
    try {
      const info = await this.transport.sendMail(this.toMailOptions(message));
      return ok(info.messageId ?? "");
    } catch (error) {
      const reason = error instanceof Error ? error.message : "Unknown error";
      return err(new MailError(`Failed to send mail: ${reason}`, { cause: error }));
    }
  }

  /**
   * Writes the message as an unsent .eml draft instead of sending it
   * @returns Path of the written draft
   */
  async saveDraft(
    message: ReportMessage,
    now: Date = new Date()
  ): Promise<Result<string, MailError>> {
    try {
      const composer = nodemailer.createTransport({
        streamTransport: true,
        buffer: true,
        newline: "unix",
      });
      const info = await composer.sendMail({
        ...this.toMailOptions(message),
        headers: { "X-Unsent": "1" },
      });

      if (!Buffer.isBuffer(info.message)) {
        return err(new MailError("Draft composer did not return a buffered message"));
      }

      await fs.mkdir(this.config.draftDirectory, { recursive: true });
      const fileName = path.join(
        this.config.draftDirectory,
        `shift-report-${now.toISOString().replace(/[:.]/g, "-")}.eml`
      );
      await fs.writeFile(fileName, info.message);

      return ok(fileName);
    } catch (error) {
      const reason = error instanceof Error ? error.message : "Unknown error";
      return err(new MailError(`Failed to write draft: ${reason}`, { cause: error }));
    }
  }

  /**
   * Sends or drafts the message depending on MAIL_MODE
   * @returns Message id (smtp) or draft path (draft)
   */
  async deliver(message: ReportMessage): Promise<Result<string, MailError>> {
    return this.config.mode === "draft"
      ? this.saveDraft(message)
      : this.send(message);
  }
}
