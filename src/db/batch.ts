// SQLite caps bound parameters per statement (32766 by default), so id
// lists are split before they reach an `IN (...)`.
export const ID_BATCH_SIZE = 500;

export function* inBatches<T>(items: readonly T[], size = ID_BATCH_SIZE): Generator<T[]> {
  for (let start = 0; start < items.length; start += size) {
    yield items.slice(start, start + size);
  }
}
