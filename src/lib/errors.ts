export type DiscoveryErrorCode =
  | "CATALOG_ERROR"
  | "CONFIGURATION_ERROR"
  | "EXTRACTION_ERROR"
  | "SOURCE_ERROR";

export class DiscoveryError extends Error {
  readonly code: DiscoveryErrorCode;

  constructor(code: DiscoveryErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or invalid category definition. Raised before any traversal. */
export class CatalogError extends DiscoveryError {
  constructor(message: string, options?: ErrorOptions) {
    super("CATALOG_ERROR", message, options);
  }
}

export class ConfigurationError extends DiscoveryError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIGURATION_ERROR", message, options);
  }
}

export class ExtractionError extends DiscoveryError {
  readonly pageUrl: string;

  constructor(pageUrl: string, message: string, options?: ErrorOptions) {
    super("EXTRACTION_ERROR", message, options);
    this.pageUrl = pageUrl;
  }
}

/** A source could not be read at all (missing bulk file, bad sitemap index). */
export class SourceError extends DiscoveryError {
  constructor(message: string, options?: ErrorOptions) {
    super("SOURCE_ERROR", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
