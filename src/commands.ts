import type { Logger } from "./logger.ts";
import { discoverVersions } from "./scanner.ts";
import { findProjectByName, type ProjectLogStore } from "./store.ts";
import type { EpochSeconds, TableRow, Version } from "./types.ts";
import { runTableView, type TableScreen } from "./ui/table.ts";

export type CommandContext = {
  scanDirs: readonly string[];
  store: ProjectLogStore;
  logger: Logger;
  now(): EpochSeconds;
  print(line: string): void;
  openTableScreen(): TableScreen;
};

export function listPythonVersions(ctx: CommandContext): void {
  const versions = discoverVersions(ctx.scanDirs, ctx.logger);
  if (!versions.length) {
    ctx.print("No Python versions found.");
    return;
  }
  ctx.print("Python versions found:");
  for (const version of versions) ctx.print(version);
}

export function listPythonProjects(ctx: CommandContext, version: Version): void {
  const log = ctx.store.load(version);
  if (!log.projects.length) {
    ctx.print(`No projects found for Python version ${version}`);
    return;
  }
  ctx.print(`Projects worked on by Python version ${version}:`);
  for (const p of log.projects) {
    ctx.print(`${p.name} (created at ${p.created_at}, last accessed at ${p.last_accessed})`);
  }
}

/** Re-adding an existing name leaves the log untouched, `last_accessed` included. */
export function addProject(ctx: CommandContext, version: Version, name: string): void {
  const log = ctx.store.load(version);
  if (findProjectByName(log, name)) {
    ctx.print(`Project '${name}' already exists for Python version ${version}`);
    return;
  }

  const timestamp = ctx.now();
  log.projects.push({ name, created_at: timestamp, last_accessed: timestamp });
  ctx.store.save(log);
  ctx.print(`Project '${name}' added to Python version ${version}`);
}

export function collectTableRows(ctx: CommandContext): TableRow[] {
  const rows: TableRow[] = [];
  for (const version of discoverVersions(ctx.scanDirs, ctx.logger)) {
    for (const project of ctx.store.load(version).projects) {
      rows.push({ version, project });
    }
  }
  return rows;
}

export async function showTable(ctx: CommandContext): Promise<void> {
  const rows = collectTableRows(ctx);
  ctx.logger.debug({ rows: rows.length }, "opening table view");
  await runTableView(rows, () => ctx.openTableScreen());
}
