// Errors raised at the remote and catalog boundaries. The scan core only
// distinguishes listing failures (fatal) from lookup failures (absorbed).

export class DriveServiceError extends Error {
  readonly operation?: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    opts: { operation?: string; statusCode?: number; cause?: unknown } = {},
  ) {
    let full = opts.operation ? `Failed to ${opts.operation}: ${message}` : message;
    if (opts.statusCode != null) {
      full = `${full} (HTTP ${opts.statusCode})`;
    }
    super(full, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "DriveServiceError";
    this.operation = opts.operation;
    this.statusCode = opts.statusCode;
  }
}

export class FileListError extends DriveServiceError {
  readonly folderId?: string;

  constructor(
    message: string,
    opts: { folderId?: string; statusCode?: number; cause?: unknown } = {},
  ) {
    super(message, {
      operation: opts.folderId
        ? `list files in folder '${opts.folderId}'`
        : "list files",
      statusCode: opts.statusCode,
      cause: opts.cause,
    });
    this.name = "FileListError";
    this.folderId = opts.folderId;
  }
}

export class FileMetadataError extends DriveServiceError {
  readonly fileId: string;

  constructor(
    message: string,
    opts: { fileId: string; statusCode?: number; cause?: unknown },
  ) {
    super(message, {
      operation: `get metadata for file '${opts.fileId}'`,
      statusCode: opts.statusCode,
      cause: opts.cause,
    });
    this.name = "FileMetadataError";
    this.fileId = opts.fileId;
  }
}

export class CatalogValidationError extends Error {
  readonly filePath?: string;
  readonly missingColumns: string[];
  readonly actualColumns: string[];

  constructor(
    message: string,
    opts: {
      filePath?: string;
      missingColumns?: Iterable<string>;
      actualColumns?: Iterable<string>;
    } = {},
  ) {
    const missing = [...(opts.missingColumns ?? [])].sort();
    let full = opts.filePath
      ? `Invalid catalog file '${opts.filePath}': ${message}`
      : message;
    if (missing.length) {
      full = `${full}. Missing columns: ${missing.join(", ")}`;
    }
    super(full);
    this.name = "CatalogValidationError";
    this.filePath = opts.filePath;
    this.missingColumns = missing;
    this.actualColumns = [...(opts.actualColumns ?? [])];
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class CredentialsNotFoundError extends Error {
  readonly credentialsPath: string;

  constructor(credentialsPath: string) {
    super(`credentials file not found at ${credentialsPath}`);
    this.name = "CredentialsNotFoundError";
    this.credentialsPath = credentialsPath;
  }
}
