import nodemailer from "nodemailer";
import type { AppConfig } from "./config.js";
import { ConfigError, SendError, describeError } from "./errors.js";
import type { OutgoingMessage } from "./types.js";

export const IMPLICIT_TLS_PORT = 465;
const SMTP_TIMEOUT_MS = 30000;

export interface Mailer {
  send(message: OutgoingMessage): Promise<void>;
  close(): void;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
}

export interface SmtpTransportOptions {
  host: string;
  port: number;
  secure: boolean;
  opportunisticTLS: boolean;
  auth: { user: string; pass: string };
  connectionTimeout: number;
  greetingTimeout: number;
  socketTimeout: number;
}

export function smtpSettingsFromConfig(config: AppConfig): SmtpSettings {
  const { SMTP_HOST: host, SMTP_USER: user, SMTP_PASS: pass } = config;
  if (!host || !user || !pass) {
    const missing = Object.entries({ SMTP_HOST: host, SMTP_USER: user, SMTP_PASS: pass })
      .filter(([, v]) => !v)
      .map(([k]) => k);
    throw new ConfigError(`Cannot send email, missing ${missing.join(", ")}`);
  }
  return { host, port: config.SMTP_PORT, user, pass, from: config.MAIL_FROM ?? user };
}

// 465 is TLS from the first byte; other ports try STARTTLS and fall back to plaintext
export function transportOptions(settings: SmtpSettings): SmtpTransportOptions {
  const implicitTls = settings.port === IMPLICIT_TLS_PORT;
  return {
    host: settings.host,
    port: settings.port,
    secure: implicitTls,
    opportunisticTLS: !implicitTls,
    auth: { user: settings.user, pass: settings.pass },
    connectionTimeout: SMTP_TIMEOUT_MS,
    greetingTimeout: SMTP_TIMEOUT_MS,
    socketTimeout: SMTP_TIMEOUT_MS,
  };
}

export function createSmtpMailer(settings: SmtpSettings): Mailer {
  const options = transportOptions(settings);
  const transporter = nodemailer.createTransport(options);

  return {
    async send(message: OutgoingMessage): Promise<void> {
      try {
        await transporter.sendMail({
          from: settings.from,
          to: message.to,
          subject: message.subject,
          text: message.text,
        });
      } catch (err) {
        throw new SendError(message.to, describeError(err));
      }
    },
    close(): void {
      transporter.close();
    },
  };
}
