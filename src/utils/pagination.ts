export interface PageResult<T> {
  items: T[];
  nextOffset: number;
}

export function nextPage<T>(items: readonly T[], offset: number, limit: number): PageResult<T> | null {
  if (offset >= items.length) {
    return limit <= 0 ? { items: [], nextOffset: offset } : null;
  }
  const end = limit <= 0 ? items.length : Math.min(items.length, offset + limit);
  return { items: items.slice(offset, end), nextOffset: end };
}
