import {
  getOptional,
  parseBoolean,
  parseChoice,
  parseIntegerInRange,
  isValidEmail,
  validateEmailList,
} from "../utils/validation";

const MAIL_MODES = ["smtp", "draft"] as const;

export type MailMode = (typeof MAIL_MODES)[number];

/**
 * SMTP connection settings
 */
export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string | null;
  password: string | null;
}

/**
 * Mail composition configuration
 */
export interface MailConfig {
  /** Empty until mail mode is used; see requireRecipients */
  to: string[];
  from: string;
  subject: string;
  greeting: string;
  closing: string;
  mode: MailMode;
  draftDirectory: string;
  smtp: SmtpConfig;
}

/**
 * Retrieves and validates mail configuration from environment variables
 * Recipients are optional here because console preview never sends mail
 */
export function getMailConfig(env: NodeJS.ProcessEnv = process.env): MailConfig {
  const toRaw = getOptional(env.MAIL_TO, "");
  const to = toRaw ? validateEmailList(toRaw) : [];

  const from = getOptional(env.MAIL_FROM, "shift-report@example.com");
  if (!isValidEmail(from)) {
    throw new Error(
      `Invalid MAIL_FROM: ${from}\n` +
        `Please ensure the sender follows the format: user@domain.com`
    );
  }

  const subject = getOptional(env.MAIL_SUBJECT, "Shift work items");
  const greeting = getOptional(
    env.MAIL_GREETING,
    "Hello team, here are the work items for the upcoming shift."
  );
  const closing = getOptional(env.MAIL_CLOSING, "Thanks,");

  const mode = parseChoice(
    "MAIL_MODE",
    getOptional(env.MAIL_MODE, "smtp"),
    MAIL_MODES
  );
  const draftDirectory = getOptional(env.MAIL_DRAFT_DIRECTORY, "./drafts");

  const smtp: SmtpConfig = {
    host: getOptional(env.SMTP_HOST, "localhost"),
    port: parseIntegerInRange(
      "SMTP_PORT",
      getOptional(env.SMTP_PORT, "25"),
      1,
      65535
    ),
    secure: parseBoolean("SMTP_SECURE", getOptional(env.SMTP_SECURE, "false")),
    user: getOptional(env.SMTP_USER, "") || null,
    password: getOptional(env.SMTP_PASSWORD, "") || null,
  };

  return {
    to,
    from,
    subject,
    greeting,
    closing,
    mode,
    draftDirectory,
    smtp,
  };
}

/**
 * Returns the recipients, failing when mail mode has none configured
 */
export function requireRecipients(config: MailConfig): string[] {
  if (config.to.length === 0) {
    throw new Error(
      `Missing required environment variable: MAIL_TO\n` +
        `Set MAIL_TO or run with --preview. See .env.example for reference.`
    );
  }
  return config.to;
}
