export type Tone = 'green' | 'orange' | 'dark-orange' | 'red' | 'grey'

export const TONE_COLORS: Record<Tone, string> = {
  green: '#00ff00aa',
  orange: '#ff9800aa',
  'dark-orange': '#ff8c00aa',
  red: '#ff0000aa',
  grey: 'grey',
}

export const DAY_MS = 24 * 60 * 60 * 1000
