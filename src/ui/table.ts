import type { TableRow } from "../types.ts";

export const TABLE_TITLE = "Python Projects";
export const TABLE_HEADER: readonly string[] = ["Version", "Project", "Created At", "Last Accessed"];

/** What the view needs from a terminal; the blessed screen is the real one. */
export interface TableScreen {
  draw(data: string[][]): void;
  nextKey(): Promise<string>;
  restore(): void;
}

export type TableViewState = "running" | "terminated";

export const QUIT_KEY = "q";

export function buildTableData(rows: readonly TableRow[]): string[][] {
  return [
    TABLE_HEADER.slice(),
    ...rows.map((r) => [
      r.version,
      r.project.name,
      String(r.project.created_at),
      String(r.project.last_accessed),
    ]),
  ];
}

export function nextViewState(state: TableViewState, key: string): TableViewState {
  if (state === "running" && key === QUIT_KEY) return "terminated";
  return state;
}

export async function runTableView(rows: readonly TableRow[], openScreen: () => TableScreen): Promise<void> {
  const data = buildTableData(rows);
  const screen = openScreen();
  try {
    let state: TableViewState = "running";
    while (state === "running") {
      screen.draw(data);
      state = nextViewState(state, await screen.nextKey());
    }
  } finally {
    screen.restore();
  }
}
