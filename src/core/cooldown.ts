import { sleep } from "./retry";

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export function randomDelayMs(range: DelayRange): number {
  const min = Math.min(range.minMs, range.maxMs);
  const max = Math.max(range.minMs, range.maxMs);
  return min + Math.random() * (max - min);
}

/** Human-paced pause between consecutive backend requests that are not part of one page loop. */
export async function actionDelay(range: DelayRange): Promise<void> {
  await sleep(randomDelayMs(range));
}
