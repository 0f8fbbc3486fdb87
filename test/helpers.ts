import pino from "pino";
import type { CommandContext } from "../src/commands.ts";
import { createProjectLogStore } from "../src/store.ts";
import type { TableScreen } from "../src/ui/table.ts";

export type FakeScreen = {
  screen: TableScreen;
  draws: string[][][];
  restoreCalls(): number;
};

/** Feeds `keys` to the view one per `nextKey()`; running out is an error. */
export function fakeScreen(keys: string[]): FakeScreen {
  const pending = keys.slice();
  const draws: string[][][] = [];
  let restored = 0;
  return {
    screen: {
      draw: (data) => {
        draws.push(data);
      },
      nextKey: async () => {
        const key = pending.shift();
        if (key === undefined) throw new Error("no more keys");
        return key;
      },
      restore: () => {
        restored++;
      },
    },
    draws,
    restoreCalls: () => restored,
  };
}

export function testContext(args: {
  logDir: string;
  scanDirs?: string[];
  now?: number;
  screen?: TableScreen;
}): { ctx: CommandContext; output: string[] } {
  const output: string[] = [];
  const ctx: CommandContext = {
    scanDirs: args.scanDirs ?? [],
    store: createProjectLogStore(args.logDir),
    logger: pino({ level: "silent" }),
    now: () => args.now ?? 1700000000,
    print: (line) => {
      output.push(line);
    },
    openTableScreen: () => {
      if (!args.screen) throw new Error("show-table requires a TTY.");
      return args.screen;
    },
  };
  return { ctx, output };
}
