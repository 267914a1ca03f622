export type MonitorErrorKind = "network" | "parse" | "not_found" | "render" | "publish" | "config";

/** Base class for every failure the monitor reports. */
export class MonitorError extends Error {
  readonly kind: MonitorErrorKind;

  constructor(kind: MonitorErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MonitorError";
    this.kind = kind;
  }
}

/** Transport failure while polling the server list or downloading map art. */
export class NetworkError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("network", message, options);
    this.name = "NetworkError";
  }
}

/** The server list body did not decode into the expected shape. */
export class ParseError extends MonitorError {
  readonly raw: string;

  constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super("parse", message, options);
    this.name = "ParseError";
    this.raw = raw;
  }
}

export class NotFoundError extends MonitorError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

/** Image decode, encode or write failure. */
export class RenderError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("render", message, options);
    this.name = "RenderError";
  }
}

/** The presence channel rejected an update. Never fatal. */
export class PublishError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("publish", message, options);
    this.name = "PublishError";
  }
}

export class ConfigError extends MonitorError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config", `Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
