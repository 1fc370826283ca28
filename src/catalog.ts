// The catalog is an insertion-ordered Map keyed by file id. Updates are
// upsert-only: ids that a fresh scan did not observe are kept as they were.

export const CATALOG_FIELDS = [
  "id",
  "name",
  "size_bytes",
  "duration_milliseconds",
  "path",
  "link",
  "created_at",
  "mime_type",
] as const;

export type CatalogField = (typeof CATALOG_FIELDS)[number];

export const REQUIRED_CATALOG_FIELDS: readonly CatalogField[] = ["id"];

export type FileRecord = Record<CatalogField, string>;

export type Catalog = Map<string, FileRecord>;

export function catalogFromRecords(records: Iterable<FileRecord>): Catalog {
  return mergeCatalog(new Map(), records);
}

export function mergeCatalog(
  existing: ReadonlyMap<string, FileRecord>,
  fresh: Iterable<FileRecord>,
): Catalog {
  const merged: Catalog = new Map(existing);
  for (const record of fresh) {
    merged.set(record.id, record);
  }
  return merged;
}

export function sortCatalog(catalog: ReadonlyMap<string, FileRecord>): FileRecord[] {
  return Array.from(catalog.values()).sort((a, b) =>
    a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
  );
}
