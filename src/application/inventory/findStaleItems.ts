import type { Item } from '@domain/models/Item.ts'
import { DAY_MS } from '@domain/constants/tones.ts'
import { daysSince } from './stockColors.ts'

export const DEFAULT_STALE_AFTER_DAYS = 7

export interface StaleItem {
  item: Item
  /** null when the item has never been checked */
  daysSinceCheck: number | null
}

/** Items not checked within `days` days, or never checked at all */
export function findStaleItems(
  items: readonly Item[],
  now: Date = new Date(),
  days: number = DEFAULT_STALE_AFTER_DAYS,
): StaleItem[] {
  const cutoff = now.getTime() - days * DAY_MS
  const stale: StaleItem[] = []

  for (const item of items) {
    if (item.lastChecked === null) {
      stale.push({ item, daysSinceCheck: null })
      continue
    }
    const checkedAt = new Date(item.lastChecked).getTime()
    if (checkedAt <= cutoff) {
      stale.push({ item, daysSinceCheck: daysSince(item.lastChecked, now) })
    }
  }

  return stale
}
