import { FOLDER_MIME_TYPE } from "../constants.js";
import { entryKindForMime, type Entry } from "../entry.js";
import { FileListError, FileMetadataError } from "../errors.js";
import type { ListOptions, ListPage, RemoteStore } from "../remote-store.js";

const ROOT_KEY = "root";

export function folder(id: string, name: string, parentId?: string): Entry {
  return node(id, name, FOLDER_MIME_TYPE, parentId);
}

export function file(
  id: string,
  name: string,
  parentId?: string,
  extra: Partial<Omit<Entry, "id" | "name" | "kind">> = {},
): Entry {
  return node(id, name, extra.mimeType ?? "application/pdf", parentId, extra);
}

export function nativeDoc(id: string, name: string, parentId?: string): Entry {
  return node(id, name, "application/vnd.google-apps.document", parentId);
}

function node(
  id: string,
  name: string,
  mimeType: string,
  parentId?: string,
  extra: Partial<Entry> = {},
): Entry {
  const entry: Entry = { ...extra, id, name, mimeType, kind: entryKindForMime(mimeType) };
  if (parentId) entry.parentId = parentId;
  return entry;
}

/**
 * In-memory tree. Children are derived from each entry's parentId; entries
 * without a parent are listed under the drive root. Page tokens are offsets.
 */
export class FakeRemoteStore implements RemoteStore {
  readonly listCalls: Array<{ folderId?: string; pageToken?: string; pageSize?: number }> = [];
  readonly getCalls: string[] = [];
  private readonly byId = new Map<string, Entry>();
  private readonly extraChildren = new Map<string, Entry[]>();
  private readonly listFailures = new Map<string, Error>();
  private readonly getFailures = new Map<string, Error>();

  constructor(
    private readonly entries: Entry[],
    private readonly pageLimit = 100,
  ) {
    for (const entry of entries) {
      this.byId.set(entry.id, entry);
    }
  }

  // list `entry` under another folder as well
  addChild(parentKey: string, entry: Entry): this {
    const list = this.extraChildren.get(parentKey) ?? [];
    list.push(entry);
    this.extraChildren.set(parentKey, list);
    return this;
  }

  failList(folderKey: string, err: Error = new FileListError("boom", { folderId: folderKey })): this {
    this.listFailures.set(folderKey, err);
    return this;
  }

  failGet(id: string, err: Error): this {
    this.getFailures.set(id, err);
    return this;
  }

  childrenOf(folderKey: string): Entry[] {
    return [
      ...this.entries.filter((e) => (e.parentId ?? ROOT_KEY) === folderKey),
      ...(this.extraChildren.get(folderKey) ?? []),
    ];
  }

  async listEntries(
    folderId: string | undefined,
    opts: ListOptions = {},
  ): Promise<ListPage> {
    this.listCalls.push({
      folderId,
      pageToken: opts.pageToken,
      pageSize: opts.pageSize,
    });
    const key = folderId ?? ROOT_KEY;
    const failure = this.listFailures.get(key);
    if (failure) throw failure;
    const children = this.childrenOf(key);
    const start = opts.pageToken ? Number(opts.pageToken) : 0;
    const end = start + this.pageLimit;
    return {
      entries: children.slice(start, end),
      nextPageToken: end < children.length ? String(end) : undefined,
    };
  }

  async getEntry(id: string): Promise<Entry> {
    this.getCalls.push(id);
    const failure = this.getFailures.get(id);
    if (failure) throw failure;
    const entry = this.byId.get(id);
    if (!entry) {
      throw new FileMetadataError("File not found", { fileId: id, statusCode: 404 });
    }
    return entry;
  }
}
