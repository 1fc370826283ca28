import type { Entry } from "./entry.js";

export type ListPage = {
  entries: Entry[];
  nextPageToken?: string;
};

export type ListOptions = {
  pageToken?: string;
  pageSize?: number;
};

/**
 * Read-only view of a remote tree. `folderId` undefined means the drive root.
 * Implementations own transport, auth, retries and timeouts; both calls may
 * reject with a DriveServiceError.
 */
export interface RemoteStore {
  listEntries(folderId: string | undefined, opts?: ListOptions): Promise<ListPage>;
  getEntry(id: string): Promise<Entry>;
}
