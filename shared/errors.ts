/**
 * Error kinds raised by the downloader. Fatal kinds abort a run; per-accession
 * kinds are collected into the run summary.
 */

export type GtdbErrorCode =
  | "CATALOG_UNAVAILABLE"
  | "TAXON_NOT_FOUND"
  | "NO_TRANSFER_TOOL"
  | "INVALID_ACCESSION"
  | "LINK_CREATION_FAILED"
  | "INVALID_ARGUMENT";

export const ERROR_SUGGESTIONS: Record<GtdbErrorCode, string> = {
  CATALOG_UNAVAILABLE: "Check your network connection or try another mirror with --mirror.",
  TAXON_NOT_FOUND:
    "Check the spelling, or pass a full lineage such as 'd__Bacteria;p__Firmicutes'.",
  NO_TRANSFER_TOOL:
    "Install aria2 (brew install aria2 / apt install aria2) or wget and make sure it is on PATH.",
  INVALID_ACCESSION: "The catalog row lacks an NCBI accession or assembly name usable for download.",
  LINK_CREATION_FAILED: "Check permissions on the output directory and that it supports symlinks.",
  INVALID_ARGUMENT: "Run with --help for usage information.",
};

export class GtdbError extends Error {
  constructor(
    message: string,
    public readonly code: GtdbErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "GtdbError";
  }

  get suggestion(): string {
    return ERROR_SUGGESTIONS[this.code];
  }

  get fatal(): boolean {
    return this.code !== "INVALID_ACCESSION" && this.code !== "LINK_CREATION_FAILED";
  }
}

export class CatalogUnavailable extends GtdbError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CATALOG_UNAVAILABLE", details);
    this.name = "CatalogUnavailable";
  }
}

export class TaxonNotFound extends GtdbError {
  constructor(public readonly query: string) {
    super(`No genomes found for taxon: ${query}`, "TAXON_NOT_FOUND", { query });
    this.name = "TaxonNotFound";
  }
}

export class NoTransferToolAvailable extends GtdbError {
  constructor(public readonly searched: string[]) {
    super(`Neither ${searched.join(" nor ")} found in PATH`, "NO_TRANSFER_TOOL", { searched });
    this.name = "NoTransferToolAvailable";
  }
}

export class InvalidAccession extends GtdbError {
  constructor(
    public readonly accession: string,
    reason: string,
  ) {
    super(`Cannot derive genome file for ${accession}: ${reason}`, "INVALID_ACCESSION", {
      accession,
    });
    this.name = "InvalidAccession";
  }
}

export class LinkCreationError extends GtdbError {
  constructor(
    public readonly accession: string,
    public readonly linkPath: string,
    cause: unknown,
  ) {
    super(
      `Could not create symlink for ${accession} at ${linkPath}: ${errorMessage(cause)}`,
      "LINK_CREATION_FAILED",
      { accession, linkPath },
    );
    this.name = "LinkCreationError";
  }
}

export class InvalidArgument extends GtdbError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_ARGUMENT", details);
    this.name = "InvalidArgument";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatError(error: unknown): string {
  if (error instanceof GtdbError) {
    return `Error [${error.code}]: ${error.message}\n\nSuggestion: ${error.suggestion}`;
  }
  if (error instanceof Error) {
    if (error.message.includes("ENOENT")) {
      return `Error: File or directory not found: ${error.message}`;
    }
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
