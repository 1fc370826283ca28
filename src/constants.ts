export const CLI_NAME = "drive-catalog";
export const VERSION = "0.1.0";

// Drive caps pageSize at 1000.
export const DEFAULT_PAGE_SIZE = 1000;
export const DEFAULT_MAX_DEPTH = 20;

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";
export const NATIVE_MIME_PREFIX = "application/vnd.google-apps.";

export const DRIVE_READONLY_SCOPE =
  "https://www.googleapis.com/auth/drive.readonly";

export function defaultFileLink(id: string): string {
  return `https://drive.google.com/file/d/${id}/view`;
}
