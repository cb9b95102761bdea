import { isAxiosError } from "axios";

export class WatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WatchError";
  }
}

export class ConfigError extends WatchError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class FetchError extends WatchError {
  readonly url: string;
  readonly status?: number;
  readonly attempts: number;

  constructor(url: string, message: string, attempts: number, status?: number) {
    super(message);
    this.name = "FetchError";
    this.url = url;
    this.attempts = attempts;
    this.status = status;
  }
}

export class ParseError extends WatchError {
  readonly url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = "ParseError";
    this.url = url;
  }
}

export class SendError extends WatchError {
  readonly recipient: string;

  constructor(recipient: string, message: string) {
    super(message);
    this.name = "SendError";
    this.recipient = recipient;
  }
}

export function describeError(err: unknown): string {
  if (isAxiosError(err)) {
    if (err.response) return `HTTP ${err.response.status}: ${err.message}`;
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
