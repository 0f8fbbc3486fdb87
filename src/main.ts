import { loadConfigOrDefault, type PymanagerConfig } from "./config.ts";
import { createLogger } from "./logger.ts";
import { createProjectLogStore, LogStoreError } from "./store.ts";
import { nowEpochSeconds } from "./time.ts";
import { addProject, listPythonProjects, listPythonVersions, showTable, type CommandContext } from "./commands.ts";
import { openBlessedTableScreen } from "./ui/blessed.ts";

export type ParsedCommand =
  | { kind: "help" }
  | { kind: "list-python-versions" }
  | { kind: "list-python-projects"; version: string }
  | { kind: "add-project"; version: string; project: string }
  | { kind: "show-table" };

export function usage(): string {
  return [
    "pymanager - track projects per installed Python version",
    "",
    "Usage:",
    "  pymanager list-python-versions                List Python versions available on the system",
    "  pymanager list-python-projects <version>      List projects logged for a Python version",
    "  pymanager add-project <version> <project>     Add a project to a Python version's log",
    "  pymanager show-table                          Show all logged projects in a table (q quits)",
    "",
    "Options:",
    "  -h, --help                                    Show help",
    "",
  ].join("\n");
}

function expectArgs(command: string, args: string[], names: string[]): string[] {
  if (args.length < names.length) {
    throw new Error(`${command} requires ${names.map((n) => `<${n}>`).join(" ")}`);
  }
  const extra = args[names.length];
  if (extra !== undefined) throw new Error(`Unexpected argument: ${extra}`);
  return args;
}

export function parseArgs(argv: string[]): ParsedCommand {
  const positionals: string[] = [];
  let stop = false;
  for (const arg of argv) {
    if (!stop && arg === "--") {
      stop = true;
      continue;
    }
    if (!stop && (arg === "-h" || arg === "--help")) return { kind: "help" };
    if (!stop && arg.startsWith("-") && arg.length > 1) throw new Error(`Unknown option: ${arg}`);
    positionals.push(arg);
  }

  const [command, ...rest] = positionals;
  switch (command) {
    case undefined:
    case "help":
      return { kind: "help" };
    case "list-python-versions":
    case "show-table":
      expectArgs(command, rest, []);
      return { kind: command };
    case "list-python-projects": {
      const [version = ""] = expectArgs(command, rest, ["version"]);
      return { kind: command, version };
    }
    case "add-project": {
      const [version = "", project = ""] = expectArgs(command, rest, ["version", "project"]);
      return { kind: command, version, project };
    }
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

export type CommandRequest = Exclude<ParsedCommand, { kind: "help" }>;

export function createCommandContext(config: PymanagerConfig): CommandContext {
  const logger = createLogger(config.logLevel);
  return {
    scanDirs: config.scanDirs,
    store: createProjectLogStore(config.logDir, logger),
    logger,
    now: nowEpochSeconds,
    print: (line) => {
      process.stdout.write(line + "\n");
    },
    openTableScreen: () => openBlessedTableScreen(config.tuiTerm),
  };
}

export async function runCommand(ctx: CommandContext, command: CommandRequest): Promise<void> {
  ctx.logger.debug({ command: command.kind }, "dispatching command");
  switch (command.kind) {
    case "list-python-versions":
      listPythonVersions(ctx);
      return;
    case "list-python-projects":
      listPythonProjects(ctx, command.version);
      return;
    case "add-project":
      addProject(ctx, command.version, command.project);
      return;
    case "show-table":
      await showTable(ctx);
      return;
  }
}

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const command = parseArgs(argv);
  if (command.kind === "help") {
    process.stdout.write(usage());
    return;
  }
  const config = loadConfigOrDefault(env);
  await runCommand(createCommandContext(config), command);
}

/** Exit code for the process: 0 on success, 1 once any error reaches here. */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    await main(argv, env);
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const cause = err instanceof LogStoreError && err.cause instanceof Error ? err.cause.message : "";
    process.stderr.write(`pymanager: ${message}\n`);
    if (cause) process.stderr.write(cause + "\n");
    return 1;
  }
}
