import { google, type drive_v3 } from "googleapis";
import type { OAuth2Client } from "google-auth-library";
import { DEFAULT_PAGE_SIZE } from "./constants.js";
import { entryKindForMime, type Entry } from "./entry.js";
import {
  errorMessage,
  FileListError,
  FileMetadataError,
} from "./errors.js";
import type { ListOptions, ListPage, RemoteStore } from "./remote-store.js";

const LIST_FIELDS =
  "nextPageToken, files(id, name, mimeType, size, createdTime, parents, webViewLink, videoMediaMetadata(durationMillis))";
const GET_FIELDS = "id, name, mimeType, parents";

// The two calls of drive.files this store depends on.
export interface DriveFilesClient {
  list(
    params: drive_v3.Params$Resource$Files$List,
  ): Promise<{ data: drive_v3.Schema$FileList }>;
  get(
    params: drive_v3.Params$Resource$Files$Get,
  ): Promise<{ data: drive_v3.Schema$File }>;
}

export function driveFilesClient(auth: OAuth2Client): DriveFilesClient {
  const drive = google.drive({ version: "v3", auth });
  return {
    list: (params) => drive.files.list(params),
    get: (params) => drive.files.get(params),
  };
}

export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if (
    "response" in err &&
    typeof err.response === "object" &&
    err.response !== null &&
    "status" in err.response &&
    typeof err.response.status === "number"
  ) {
    return err.response.status;
  }
  if ("code" in err) {
    const code = Number(err.code);
    if (Number.isInteger(code) && code >= 100 && code < 600) return code;
  }
  return undefined;
}

function quoteQueryValue(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

export function toEntry(file: drive_v3.Schema$File): Entry {
  const mimeType = file.mimeType ?? "";
  const entry: Entry = {
    id: file.id ?? "",
    name: file.name ?? "",
    kind: entryKindForMime(mimeType),
    mimeType,
  };
  if (file.size) entry.size = file.size;
  if (file.createdTime) entry.createdTime = file.createdTime;
  const parentId = file.parents?.[0];
  if (parentId) entry.parentId = parentId;
  if (file.webViewLink) entry.link = file.webViewLink;
  const duration = file.videoMediaMetadata?.durationMillis;
  if (duration) entry.durationMillis = duration;
  return entry;
}

export class DriveRemoteStore implements RemoteStore {
  private readonly pageSize: number;

  constructor(
    private readonly files: DriveFilesClient,
    opts: { pageSize?: number } = {},
  ) {
    this.pageSize = opts.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async listEntries(
    folderId: string | undefined,
    opts: ListOptions = {},
  ): Promise<ListPage> {
    const q = `${quoteQueryValue(folderId ?? "root")} in parents and trashed=false`;
    let data: drive_v3.Schema$FileList;
    try {
      ({ data } = await this.files.list({
        q,
        pageSize: opts.pageSize ?? this.pageSize,
        pageToken: opts.pageToken,
        fields: LIST_FIELDS,
      }));
    } catch (err) {
      throw new FileListError(errorMessage(err), {
        folderId,
        statusCode: httpStatusOf(err),
        cause: err,
      });
    }
    return {
      entries: (data.files ?? []).map(toEntry),
      nextPageToken: data.nextPageToken ?? undefined,
    };
  }

  async getEntry(id: string): Promise<Entry> {
    try {
      const { data } = await this.files.get({ fileId: id, fields: GET_FIELDS });
      return toEntry(data);
    } catch (err) {
      throw new FileMetadataError(errorMessage(err), {
        fileId: id,
        statusCode: httpStatusOf(err),
        cause: err,
      });
    }
  }
}
