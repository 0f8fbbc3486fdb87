import type { EpochSeconds } from "./types.ts";

export function nowEpochSeconds(): EpochSeconds {
  return Math.floor(Date.now() / 1000);
}
