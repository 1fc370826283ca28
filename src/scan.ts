// src/scan.ts
import { access } from "node:fs/promises";
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { Command, InvalidArgumentError } from "commander";
import {
  catalogFromRecords,
  mergeCatalog,
  type Catalog,
} from "./catalog.js";
import { CsvCatalogStore, type CatalogStore } from "./catalog-store.js";
import {
  defaultMaxDepth,
  defaultPageSize,
  getTokenPath,
  parsePositiveInt,
} from "./config.js";
import { authorize } from "./drive-auth.js";
import { DriveRemoteStore, driveFilesClient } from "./drive-store.js";
import { enumerateTree, type ScanStats } from "./enumerate.js";
import {
  CatalogValidationError,
  CredentialsNotFoundError,
  errorMessage,
} from "./errors.js";
import { ConsoleLogger, type LogLevel, type Logger } from "./logger.js";
import type { RemoteStore } from "./remote-store.js";

export type ConnectOptions = {
  credentialsPath: string;
  tokenPath: string;
  pageSize: number;
  logger: Logger;
};

export type ScanOptions = {
  output: string;
  folderId?: string;
  update?: boolean;
  credentials: string;
  token?: string;
  pageSize?: number;
  maxDepth?: number;
  logger?: Logger;
  logLevel?: LogLevel;
  // overrides for tests and embedding
  connect?: (opts: ConnectOptions) => Promise<RemoteStore>;
  catalogStore?: CatalogStore;
  out?: (line: string) => void;
};

const PROGRESS_EVERY = 100;

const CREDENTIALS_HELP = `To use this tool you need to:
  1. Create a project in Google Cloud Console
  2. Enable the Google Drive API
  3. Create OAuth 2.0 credentials (Desktop app)
  4. Download the credentials JSON file
  5. Save it as 'credentials.json' or pass its path with --credentials`;

function intOption(name: string) {
  return (value: string): number => {
    let parsed: number | undefined;
    try {
      parsed = parsePositiveInt(value, name);
    } catch (err) {
      throw new InvalidArgumentError(errorMessage(err));
    }
    if (parsed === undefined) {
      throw new InvalidArgumentError(`${name} must be a positive integer`);
    }
    return parsed;
  };
}

export function configureScanCommand(command: Command): Command {
  return command
    .description(
      "Scan Google Drive and write a CSV catalog with file metadata (name, size, duration, path, link, created_at)",
    )
    .option("-o, --output <file>", "output CSV file", "catalog.csv")
    .option(
      "-f, --folder-id <id>",
      "Drive folder id to scan (the whole drive when omitted)",
    )
    .option(
      "-u, --update",
      "merge into an existing catalog instead of replacing it",
      false,
    )
    .option(
      "-c, --credentials <file>",
      "Google OAuth client credentials JSON",
      "credentials.json",
    )
    .option("--token <file>", "where the OAuth token is cached")
    .option(
      "--page-size <n>",
      "entries requested per listing page (env DRIVE_CATALOG_PAGE_SIZE)",
      intOption("--page-size"),
    )
    .option(
      "--max-depth <n>",
      "maximum number of ancestors walked per path (env DRIVE_CATALOG_MAX_DEPTH)",
      intOption("--max-depth"),
    );
}

async function fileExists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

export async function connectDrive(opts: ConnectOptions): Promise<RemoteStore> {
  if (!(await fileExists(opts.credentialsPath))) {
    throw new CredentialsNotFoundError(opts.credentialsPath);
  }
  const auth = await authorize({
    credentialsPath: opts.credentialsPath,
    tokenPath: opts.tokenPath,
    logger: opts.logger,
  });
  return new DriveRemoteStore(driveFilesClient(auth), {
    pageSize: opts.pageSize,
  });
}

export function renderScanStats(stats: ScanStats, catalogSize: number): string {
  const truncated = Object.entries(stats.truncatedPaths)
    .map(([reason, count]) => `${reason}: ${count}`)
    .join(", ");
  const table = new AsciiTable3("Scan")
    .setHeading("Metric", "Value")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  table.setAlign(2, AlignmentEnum.RIGHT);
  table.addRow("Folders listed", String(stats.foldersListed));
  table.addRow("Pages fetched", String(stats.pagesFetched));
  table.addRow("Files found", String(stats.filesFound));
  table.addRow("Native documents skipped", String(stats.nativeSkipped));
  table.addRow("Truncated paths", truncated || "0");
  table.addRow("Catalog entries", String(catalogSize));
  return table.toString();
}

/**
 * Scan, merge (with --update) and save. Resolves to the process exit code;
 * remote listing failures reject.
 */
export async function runScan(opts: ScanOptions): Promise<number> {
  const logger = opts.logger ?? new ConsoleLogger(opts.logLevel ?? "info");
  const out = opts.out ?? ((line: string) => console.log(line));
  const store = opts.catalogStore ?? new CsvCatalogStore();
  const pageSize = opts.pageSize ?? defaultPageSize();
  const maxDepth = opts.maxDepth ?? defaultMaxDepth();

  let existing: Catalog = new Map();
  if (opts.update && (await fileExists(opts.output))) {
    try {
      existing = await store.load(opts.output);
    } catch (err) {
      if (err instanceof CatalogValidationError) {
        logger.error(err.message, {
          missingColumns: err.missingColumns,
          actualColumns: err.actualColumns,
        });
        out(
          `The existing catalog cannot be updated. Fix its header row (it needs an 'id' column) or scan without --update.`,
        );
        return 1;
      }
      throw err;
    }
    out(`Loaded ${existing.size} existing entries from ${opts.output}`);
  }

  const connect = opts.connect ?? connectDrive;
  let remote: RemoteStore;
  try {
    remote = await connect({
      credentialsPath: opts.credentials,
      tokenPath: opts.token ?? getTokenPath(),
      pageSize,
      logger: logger.child("drive"),
    });
  } catch (err) {
    if (err instanceof CredentialsNotFoundError) {
      logger.error(err.message);
      out(CREDENTIALS_HELP);
      return 1;
    }
    throw err;
  }

  const scanLogger = logger.child("scan");
  const { records, stats } = await enumerateTree(remote, {
    rootFolderId: opts.folderId,
    pageSize,
    maxDepth,
    logger: scanLogger,
    onFolder: (_folderId, count) => {
      if (count % PROGRESS_EVERY === 0) {
        scanLogger.info("scanning", { folders: count });
      }
    },
  });
  out(`Found ${records.length} files in ${stats.foldersListed} folders`);

  const catalog = opts.update
    ? mergeCatalog(existing, records)
    : catalogFromRecords(records);
  if (opts.update) {
    out(`Merged catalog contains ${catalog.size} total entries`);
  }

  await store.save(opts.output, catalog);
  out(renderScanStats(stats, catalog.size));
  out(`Catalog saved to ${opts.output}`);
  return 0;
}
