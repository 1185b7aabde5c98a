import type { Batch, WorkItem } from "./work.types";

/**
 * Contiguous chunking; the last batch may be shorter. No rebalancing.
 */
export const partitionIntoBatches = (items: readonly WorkItem[], batchSize: number): Batch[] => {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`batchSize must be an integer >= 1. Received: ${String(batchSize)}`);
  }

  const batches: Batch[] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    batches.push({ index: batches.length, items: items.slice(start, start + batchSize) });
  }
  return batches;
};
