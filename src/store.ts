import fs from "node:fs";
import path from "node:path";
import { randomBytes } from "node:crypto";
import type { Logger } from "./logger.ts";
import type { Project, ProjectLog, Version } from "./types.ts";

export class LogStoreError extends Error {
  filePath: string;
  constructor(message: string, filePath: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LogStoreError";
    this.filePath = filePath;
  }
}

export type ProjectLogStore = {
  load(version: Version): ProjectLog;
  save(log: ProjectLog): void;
};

function assertVersionKey(baseDir: string, version: Version): void {
  if (!version || version === "." || version === ".." || /[\\/]/.test(version)) {
    throw new LogStoreError(`Invalid Python version: ${JSON.stringify(version)}`, baseDir);
  }
}

export function getLogFilePath(baseDir: string, version: Version): string {
  assertVersionKey(baseDir, version);
  return path.join(baseDir, `${version}.json`);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isEpochSeconds(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function parseProject(value: unknown): Project | null {
  if (!isObject(value)) return null;
  const { name, created_at, last_accessed } = value;
  if (typeof name !== "string" || !isEpochSeconds(created_at) || !isEpochSeconds(last_accessed)) return null;
  return { name, created_at, last_accessed };
}

export function parseProjectLog(raw: string, version: Version, filePath: string): ProjectLog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new LogStoreError(`Malformed project log: ${filePath}`, filePath, { cause: err });
  }
  // The stored version is only checked for shape; the file name is the key.
  if (!isObject(parsed) || typeof parsed.version !== "string" || !Array.isArray(parsed.projects)) {
    throw new LogStoreError(`Invalid project log: ${filePath}`, filePath);
  }

  const projects: Project[] = [];
  for (const entry of parsed.projects) {
    const project = parseProject(entry);
    if (!project) throw new LogStoreError(`Invalid project log: ${filePath}`, filePath);
    projects.push(project);
  }
  return { version, projects };
}

export function serializeProjectLog(log: ProjectLog): string {
  const doc: ProjectLog = {
    version: log.version,
    projects: log.projects.map((p) => ({ name: p.name, created_at: p.created_at, last_accessed: p.last_accessed })),
  };
  return JSON.stringify(doc, null, 2) + "\n";
}

export function loadProjectLog(baseDir: string, version: Version): ProjectLog {
  const filePath = getLogFilePath(baseDir, version);
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, { encoding: "utf8", flag: "r" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return { version, projects: [] };
    throw new LogStoreError(`Could not read project log: ${filePath}`, filePath, { cause: err });
  }
  return parseProjectLog(raw, version, filePath);
}

export function writeProjectLog(baseDir: string, log: ProjectLog): void {
  const filePath = getLogFilePath(baseDir, log.version);
  try {
    fs.mkdirSync(baseDir, { recursive: true });
    const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}-${randomBytes(3).toString("hex")}`;
    fs.writeFileSync(tmpPath, serializeProjectLog(log), { encoding: "utf8" });
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    throw new LogStoreError(`Could not write project log: ${filePath}`, filePath, { cause: err });
  }
}

/** No cache: every load goes back to disk. */
export function createProjectLogStore(baseDir: string, logger?: Logger): ProjectLogStore {
  return {
    load(version) {
      const log = loadProjectLog(baseDir, version);
      logger?.debug({ version, projects: log.projects.length }, "loaded project log");
      return log;
    },
    save(log) {
      writeProjectLog(baseDir, log);
      logger?.debug({ version: log.version, file: getLogFilePath(baseDir, log.version) }, "saved project log");
    },
  };
}

export function findProjectByName(log: ProjectLog, name: string): Project | null {
  return log.projects.find((p) => p.name === name) ?? null;
}
