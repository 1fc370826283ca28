import {
  FOLDER_MIME_TYPE,
  NATIVE_MIME_PREFIX,
  defaultFileLink,
} from "./constants.js";
import type { FileRecord } from "./catalog.js";

export type EntryKind = "folder" | "native-document" | "file";

// One node of the remote tree, as reported by a RemoteStore.
export type Entry = {
  id: string;
  name: string;
  kind: EntryKind;
  mimeType: string;
  size?: string;
  createdTime?: string;
  parentId?: string;
  link?: string;
  durationMillis?: string;
};

export const AUDIO_MIME_TYPES: ReadonlySet<string> = new Set([
  "audio/mpeg",
  "audio/mp3",
  "audio/mp4",
  "audio/wav",
  "audio/flac",
  "audio/ogg",
  "audio/aac",
  "audio/x-m4a",
  "audio/webm",
]);

export const VIDEO_MIME_TYPES: ReadonlySet<string> = new Set([
  "video/mp4",
  "video/mpeg",
  "video/quicktime",
  "video/x-msvideo",
  "video/x-matroska",
  "video/webm",
  "video/3gpp",
]);

export function entryKindForMime(mimeType: string | null | undefined): EntryKind {
  if (mimeType === FOLDER_MIME_TYPE) return "folder";
  if (mimeType?.startsWith(NATIVE_MIME_PREFIX)) return "native-document";
  return "file";
}

export function isTimedMedia(mimeType: string): boolean {
  return AUDIO_MIME_TYPES.has(mimeType) || VIDEO_MIME_TYPES.has(mimeType);
}

/**
 * Build the catalog row for a regular file. The duration hint is copied as
 * given (milliseconds) and only for audio/video types.
 */
export function extractFileRecord(entry: Entry, path: string): FileRecord {
  const duration =
    isTimedMedia(entry.mimeType) && entry.durationMillis
      ? entry.durationMillis
      : "";
  return {
    id: entry.id,
    name: entry.name,
    size_bytes: entry.size || "0",
    duration_milliseconds: duration,
    path,
    link: entry.link || defaultFileLink(entry.id),
    created_at: entry.createdTime ?? "",
    mime_type: entry.mimeType,
  };
}
