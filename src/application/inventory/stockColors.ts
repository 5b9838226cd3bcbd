import { DAY_MS, type Tone } from '@domain/constants/tones.ts'

/**
 * Whole days between `lastChecked` and `now`, rounded down.
 * A timestamp in the future counts as checked today.
 */
export function daysSince(lastChecked: string | Date, now: Date): number {
  const checkedAt = typeof lastChecked === 'string' ? new Date(lastChecked) : lastChecked
  return Math.floor((now.getTime() - checkedAt.getTime()) / DAY_MS)
}

/**
 * Row tone by recency of the last check:
 * under 1 day green, 1-3 days orange, 4-8 days dark orange, older red.
 */
export function getRowColor(lastChecked: string | Date | null, now: Date = new Date()): Tone {
  if (lastChecked === null) return 'grey'

  const days = daysSince(lastChecked, now)
  if (Number.isNaN(days)) return 'grey'
  if (days < 1) return 'green'
  if (days < 4) return 'orange'
  if (days <= 8) return 'dark-orange'
  return 'red'
}

/** Warning tone by stock level relative to the alert threshold */
export function getWarningColor(quantity: number | null, alertQuantity: number | null): Tone {
  if (quantity === null || alertQuantity === null) return 'grey'

  const difference = quantity - alertQuantity
  if (difference === 0) return 'orange'
  if (difference < 0) return 'red'
  return 'green'
}
