import type { RemoteStore } from "./remote-store.js";
import { DriveServiceError } from "./errors.js";
import { DEFAULT_MAX_DEPTH } from "./constants.js";

export type FolderInfo = {
  name: string;
  parentId?: string;
};

// id -> folder name/parent, filled lazily during one scan and never
// invalidated while it runs.
export type FolderCache = Map<string, FolderInfo>;

export type TruncationReason =
  | "cycle"
  | "depth-limit"
  | "not-found"
  | "lookup-failed";

export type PathResolution =
  | { path: string; complete: true }
  | {
      path: string;
      complete: false;
      reason: TruncationReason;
      // ancestor id at which the walk stopped
      at: string;
    };

export type ResolveContext = {
  store: Pick<RemoteStore, "getEntry">;
  cache: FolderCache;
  maxDepth?: number;
};

function joinSegments(segments: string[]): string {
  return "/" + segments.join("/");
}

function lookupFailureReason(err: unknown): TruncationReason {
  return err instanceof DriveServiceError && err.statusCode === 404
    ? "not-found"
    : "lookup-failed";
}

async function lookupFolder(
  ctx: ResolveContext,
  id: string,
): Promise<FolderInfo> {
  const cached = ctx.cache.get(id);
  if (cached) return cached;
  const entry = await ctx.store.getEntry(id);
  const info: FolderInfo = { name: entry.name, parentId: entry.parentId };
  ctx.cache.set(id, info);
  return info;
}

/**
 * Resolve the absolute path of an entry named `name` whose immediate parent is
 * `parentId`, walking ancestors through the folder cache and falling back to
 * point lookups. Never throws for lookup failures, cycles or deep chains;
 * those produce a truncated path with the reason attached.
 */
export async function resolvePath(
  name: string,
  parentId: string | undefined,
  ctx: ResolveContext,
): Promise<PathResolution> {
  if (!parentId) {
    return { path: joinSegments([name]), complete: true };
  }
  const maxDepth = ctx.maxDepth ?? DEFAULT_MAX_DEPTH;
  const segments = [name];
  const seen = new Set<string>();
  let current: string | undefined = parentId;
  let depth = 0;

  while (current) {
    if (seen.has(current)) {
      return truncated(segments, "cycle", current);
    }
    if (depth >= maxDepth) {
      return truncated(segments, "depth-limit", current);
    }
    seen.add(current);
    depth += 1;

    let info: FolderInfo;
    try {
      info = await lookupFolder(ctx, current);
    } catch (err) {
      return truncated(segments, lookupFailureReason(err), current);
    }
    if (info.name) {
      segments.unshift(info.name);
    }
    current = info.parentId;
  }

  return { path: joinSegments(segments), complete: true };
}

function truncated(
  segments: string[],
  reason: TruncationReason,
  at: string,
): PathResolution {
  return { path: joinSegments(segments), complete: false, reason, at };
}
