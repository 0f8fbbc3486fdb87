import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { isLogLevel, type LogLevel } from "./logger.ts";
import { resolveConfiguredPath, splitPathList } from "./paths.ts";

export type PymanagerConfig = {
  logDir: string;
  scanDirs: string[];
  logLevel: LogLevel;
  /** terminfo name handed to blessed for the table view */
  tuiTerm?: string;
};

export const DEFAULT_LOG_DIR = "/var/log/pymanager";
export const DEFAULT_SCAN_DIRS: readonly string[] = ["/usr/bin", "/usr/local/bin"];

function defaultConfig(): PymanagerConfig {
  return {
    logDir: DEFAULT_LOG_DIR,
    scanDirs: DEFAULT_SCAN_DIRS.slice(),
    logLevel: "warn",
  };
}

export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.PYMANAGER_CONFIG?.trim();
  if (override) return resolveConfiguredPath(override);

  const xdg = env.XDG_CONFIG_HOME?.trim();
  const base = xdg || path.join(os.homedir(), ".config");
  return path.join(base, "pymanager", "config.json");
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readConfigFile(filePath: string): Partial<PymanagerConfig> {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  if (!stat) return {};
  if (!stat.isFile()) throw new Error(`Config path is not a file: ${filePath}`);

  const raw = fs.readFileSync(filePath, { encoding: "utf8" });
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid config file: ${filePath}`, { cause: err });
  }
  if (!isObject(parsed)) throw new Error(`Invalid config file: ${filePath}`);

  const out: Partial<PymanagerConfig> = {};
  if (parsed.logDir !== undefined) {
    if (typeof parsed.logDir !== "string" || !parsed.logDir.trim()) throw new Error(`Invalid config file: ${filePath}`);
    out.logDir = resolveConfiguredPath(parsed.logDir);
  }
  if (parsed.scanDirs !== undefined) {
    const dirs = parsed.scanDirs;
    if (!Array.isArray(dirs) || !dirs.every((d): d is string => typeof d === "string")) {
      throw new Error(`Invalid config file: ${filePath}`);
    }
    out.scanDirs = dirs.filter((d) => d.trim()).map(resolveConfiguredPath);
  }
  if (parsed.logLevel !== undefined) {
    if (!isLogLevel(parsed.logLevel)) throw new Error(`Invalid config file: ${filePath}`);
    out.logLevel = parsed.logLevel;
  }
  if (parsed.tuiTerm !== undefined) {
    if (typeof parsed.tuiTerm !== "string" || !parsed.tuiTerm.trim()) throw new Error(`Invalid config file: ${filePath}`);
    out.tuiTerm = parsed.tuiTerm.trim();
  }
  return out;
}

export function loadConfigOrDefault(env: NodeJS.ProcessEnv = process.env): PymanagerConfig {
  const config = { ...defaultConfig(), ...readConfigFile(getConfigFilePath(env)) };

  const logDir = env.PYMANAGER_LOG_DIR?.trim();
  if (logDir) config.logDir = resolveConfiguredPath(logDir);

  const scanDirs = env.PYMANAGER_SCAN_DIRS?.trim();
  if (scanDirs) config.scanDirs = splitPathList(scanDirs);

  const logLevel = env.PYMANAGER_LOG_LEVEL?.trim().toLowerCase();
  if (logLevel) {
    if (!isLogLevel(logLevel)) throw new Error(`Invalid PYMANAGER_LOG_LEVEL: ${logLevel}`);
    config.logLevel = logLevel;
  }

  const tuiTerm = env.PYMANAGER_TUI_TERM?.trim();
  if (tuiTerm) config.tuiTerm = tuiTerm;

  return config;
}
