import fs from "node:fs";
import type { Logger } from "./logger.ts";
import type { Version } from "./types.ts";

const ENTRY_PREFIX = "python";
const VERSION_RE = /^python(\d+)\.(\d+)/;

/**
 * Extracts `<major>.<minor>` from an interpreter filename such as
 * `python3.11` or `python3.10.1`. Digits are captured greedily, so
 * `python3.100` is `3.100`, never `3.10`.
 */
export function parseVersionFromEntryName(name: string): Version | null {
  if (!name.startsWith(ENTRY_PREFIX)) return null;
  const match = VERSION_RE.exec(name);
  if (!match) return null;
  const [, major, minor] = match;
  if (major === undefined || minor === undefined) return null;
  return `${major}.${minor}`;
}

function readEntryNames(dir: string, logger?: Logger): string[] {
  try {
    return fs.readdirSync(dir);
  } catch (err) {
    logger?.debug({ dir, err }, "skipping unreadable scan directory");
    return [];
  }
}

/** Direct entries only, first appearance wins, not sorted. */
export function discoverVersions(dirs: readonly string[], logger?: Logger): Version[] {
  const versions: Version[] = [];
  for (const dir of dirs) {
    const names = readEntryNames(dir, logger);
    logger?.debug({ dir, entries: names.length }, "scanned directory");
    for (const name of names) {
      const version = parseVersionFromEntryName(name);
      if (version && !versions.includes(version)) versions.push(version);
    }
  }
  return versions;
}
