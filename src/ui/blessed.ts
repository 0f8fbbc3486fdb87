import blessed from "blessed";
import type { Widgets } from "blessed";
import { TABLE_TITLE, type TableScreen } from "./table.ts";

const colors = {
  header: "yellow",
  border: "#457b9d",
};

/**
 * Puts the project table on `screen`. Cells are plain text: tag parsing
 * stays off so names like `{bold}x{/bold}` show as stored.
 */
export function attachTableView(screen: Widgets.Screen): TableScreen {
  const table = blessed.table({
    parent: screen,
    top: 0,
    left: 0,
    width: "100%",
    height: "100%",
    border: "line",
    label: ` ${TABLE_TITLE} `,
    align: "left",
    noCellBorders: true,
    pad: 1,
    style: {
      border: { fg: colors.border },
      header: { fg: colors.header, bold: true },
      cell: { fg: "default" },
    },
  });

  const queued: string[] = [];
  let waiting: ((key: string) => void) | null = null;
  let restored = false;

  screen.on("keypress", (ch: string | undefined, key: Widgets.Events.IKeyEventArg) => {
    const pressed = ch ?? key.full;
    if (waiting) {
      const resolve = waiting;
      waiting = null;
      resolve(pressed);
      return;
    }
    queued.push(pressed);
  });

  return {
    draw(data) {
      table.setData(data);
      screen.render();
    },
    nextKey() {
      const next = queued.shift();
      if (next !== undefined) return Promise.resolve(next);
      return new Promise<string>((resolve) => {
        waiting = resolve;
      });
    },
    restore() {
      if (restored) return;
      restored = true;
      screen.destroy();
    },
  };
}

/**
 * Opens the alternate screen in raw mode with the cursor hidden.
 * `restore()` undoes all three; blessed also does so from its own
 * process exit hook if the process dies before `restore()` runs.
 */
export function openBlessedTableScreen(terminal?: string): TableScreen {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new Error("show-table requires a TTY.");
  }
  return attachTableView(blessed.screen({ smartCSR: true, title: TABLE_TITLE, terminal }));
}
