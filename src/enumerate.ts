import type { FileRecord } from "./catalog.js";
import { extractFileRecord } from "./entry.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  resolvePath,
  type FolderCache,
  type TruncationReason,
} from "./path-resolver.js";
import type { RemoteStore } from "./remote-store.js";

// Stands in for "the drive root" in the queue and the visited set.
const DRIVE_ROOT = Symbol("drive-root");

type QueuedFolder = string | typeof DRIVE_ROOT;

export type ScanStats = {
  foldersListed: number;
  pagesFetched: number;
  filesFound: number;
  nativeSkipped: number;
  truncatedPaths: Partial<Record<TruncationReason, number>>;
};

export type ScanResult = {
  records: FileRecord[];
  stats: ScanStats;
};

export type EnumerateOptions = {
  rootFolderId?: string;
  pageSize?: number;
  maxDepth?: number;
  logger?: Logger;
  onFolder?: (folderId: string | undefined, foldersListed: number) => void;
};

/**
 * Breadth-first walk of the tree below `rootFolderId` (the whole drive when
 * omitted). Every folder id is listed at most once; one remote call is in
 * flight at a time. A failing listing call rejects the whole scan.
 */
export async function enumerateTree(
  store: RemoteStore,
  opts: EnumerateOptions = {},
): Promise<ScanResult> {
  const logger = opts.logger ?? new NullLogger();
  const queue: QueuedFolder[] = [opts.rootFolderId ?? DRIVE_ROOT];
  const visited = new Set<QueuedFolder>();
  const cache: FolderCache = new Map();
  const records: FileRecord[] = [];
  const stats: ScanStats = {
    foldersListed: 0,
    pagesFetched: 0,
    filesFound: 0,
    nativeSkipped: 0,
    truncatedPaths: {},
  };

  for (let head = 0; head < queue.length; head++) {
    const folder = queue[head];
    if (visited.has(folder)) continue;
    visited.add(folder);
    stats.foldersListed = visited.size;

    const folderId = folder === DRIVE_ROOT ? undefined : folder;
    opts.onFolder?.(folderId, visited.size);
    logger.debug("listing folder", { folderId: folderId ?? "root" });

    let pageToken: string | undefined;
    do {
      const page = await store.listEntries(folderId, {
        pageToken,
        pageSize: opts.pageSize,
      });
      stats.pagesFetched += 1;

      for (const entry of page.entries) {
        if (entry.kind === "folder") {
          queue.push(entry.id);
          continue;
        }
        if (entry.kind === "native-document") {
          stats.nativeSkipped += 1;
          continue;
        }
        const resolved = await resolvePath(entry.name, entry.parentId, {
          store,
          cache,
          maxDepth: opts.maxDepth,
        });
        if (!resolved.complete) {
          stats.truncatedPaths[resolved.reason] =
            (stats.truncatedPaths[resolved.reason] ?? 0) + 1;
          logger.warn("path truncated", {
            id: entry.id,
            path: resolved.path,
            reason: resolved.reason,
            at: resolved.at,
          });
        }
        records.push(extractFileRecord(entry, resolved.path));
        stats.filesFound += 1;
      }
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);
  }

  logger.info("scan complete", {
    folders: stats.foldersListed,
    files: stats.filesFound,
  });
  return { records, stats };
}
