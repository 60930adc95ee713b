/**
 * Item identifiers. Each collection allocates from its own counter; an
 * identifier is never reused, even after the collection is cleared.
 */

export type NativeItemId = number;
export type FfiItemId = number;
export type SurfaceItemId = number;

export type NextIds = {
  readonly native: number;
  readonly ffi: number;
  readonly surface: number;
};

export const INITIAL_NEXT_IDS: NextIds = { native: 1, ffi: 1, surface: 1 };

/**
 * Binary search over items sorted by identifier.
 */
export const findIndexById = <T extends { readonly id: number }>(
  items: readonly T[],
  id: number
): number | undefined => {
  let low = 0;
  let high = items.length - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    const midId = items[mid]?.id;
    if (midId === undefined) return undefined;
    if (midId === id) return mid;
    if (midId < id) {
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return undefined;
};
