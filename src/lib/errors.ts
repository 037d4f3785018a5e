export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type CatalogErrorKind = "notFound" | "quotaExceeded" | "other";

export class CatalogError extends Error {
  readonly kind: CatalogErrorKind;
  readonly status?: number;
  readonly reason?: string;

  constructor(
    kind: CatalogErrorKind,
    message: string,
    details: { status?: number; reason?: string } = {}
  ) {
    super(message);
    this.name = "CatalogError";
    this.kind = kind;
    this.status = details.status;
    this.reason = details.reason;
  }
}

export class SinkError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "SinkError";
    this.status = status;
  }
}

export const isQuotaExceeded = (e: unknown): e is CatalogError =>
  e instanceof CatalogError && e.kind === "quotaExceeded";

export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
