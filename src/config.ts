import os from "node:os";
import { join } from "node:path";
import {
  CLI_NAME,
  DEFAULT_MAX_DEPTH,
  DEFAULT_PAGE_SIZE,
} from "./constants.js";

export function getCatalogHome(): string {
  const explicit = process.env.DRIVE_CATALOG_HOME?.trim();
  if (explicit) {
    return expandHome(explicit);
  }

  // XDG first
  const xdg = process.env.XDG_DATA_HOME;
  if (xdg && xdg.trim()) {
    return join(expandHome(xdg), CLI_NAME);
  }

  const home = os.homedir();
  if (process.platform === "darwin") {
    return join(home, "Library", "Application Support", CLI_NAME);
  }
  if (process.platform === "win32") {
    const appData = process.env.APPDATA || join(home, "AppData", "Roaming");
    return join(appData, CLI_NAME);
  }
  return join(home, ".local", "share", CLI_NAME);
}

export function getTokenPath(): string {
  return join(getCatalogHome(), "token.json");
}

function expandHome(p: string): string {
  if (p.startsWith("~")) {
    return join(os.homedir(), p.slice(1));
  }
  return p;
}

export function parsePositiveInt(raw: string | undefined, name: string): number | undefined {
  if (raw == null || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer (got '${raw}')`);
  }
  return value;
}

export function defaultPageSize(): number {
  return (
    parsePositiveInt(process.env.DRIVE_CATALOG_PAGE_SIZE, "DRIVE_CATALOG_PAGE_SIZE") ??
    DEFAULT_PAGE_SIZE
  );
}

export function defaultMaxDepth(): number {
  return (
    parsePositiveInt(process.env.DRIVE_CATALOG_MAX_DEPTH, "DRIVE_CATALOG_MAX_DEPTH") ??
    DEFAULT_MAX_DEPTH
  );
}
