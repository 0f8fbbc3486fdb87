import os from "node:os";
import path from "node:path";

export function expandHome(inputPath: string): string {
  if (inputPath === "~") return os.homedir();
  if (inputPath.startsWith("~/")) return path.join(os.homedir(), inputPath.slice(2));
  return inputPath;
}

export function resolveConfiguredPath(inputPath: string): string {
  return path.resolve(expandHome(inputPath.trim()));
}

export function splitPathList(raw: string): string[] {
  return raw
    .split(path.delimiter)
    .map((p) => p.trim())
    .filter(Boolean)
    .map(resolveConfiguredPath);
}
