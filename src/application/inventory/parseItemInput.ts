import type { ItemChanges, NewItem } from '@domain/models/Item.ts'
import { ValidationError } from '@domain/errors.ts'

/** Loosely-typed request payload: a parsed JSON body or a urlencoded form */
export type ItemInput = Record<string, unknown>

const DIGITS = /^\d+$/

/**
 * Parse a non-negative integer. Empty input yields null;
 * anything other than a run of digits is rejected.
 */
export function parseCount(raw: unknown, label: string, field?: string): number | null {
  if (raw === undefined || raw === null) return null
  if (typeof raw === 'number') {
    if (Number.isSafeInteger(raw) && raw >= 0) return raw
    throw new ValidationError(`${label} must be a non-negative integer`, field)
  }
  if (typeof raw !== 'string') {
    throw new ValidationError(`${label} must be a non-negative integer`, field)
  }
  const trimmed = raw.trim()
  if (trimmed === '') return null
  if (!DIGITS.test(trimmed)) {
    throw new ValidationError(`${label} must be a non-negative integer`, field)
  }
  const count = Number.parseInt(trimmed, 10)
  // Longer digit runs would be rounded on the way to the database
  if (!Number.isSafeInteger(count)) {
    throw new ValidationError(`${label} must be a non-negative integer`, field)
  }
  return count
}

function readText(input: ItemInput, field: string): string | undefined {
  const value = input[field]
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  return trimmed === '' ? undefined : trimmed
}

export function parseNewItem(input: ItemInput): NewItem {
  const name = readText(input, 'name')
  const unit = readText(input, 'unit')
  const category = readText(input, 'category')
  if (!name || !unit || !category) {
    throw new ValidationError('Name, unit and category must all be filled in')
  }

  return {
    name,
    unit,
    category,
    quantity: parseCount(input.quantity, 'Quantity', 'quantity') ?? 0,
    alertQuantity: parseCount(input.alertQuantity, 'Alert quantity', 'alertQuantity') ?? 0,
  }
}

/** Fields left out (or sent empty) keep their current value */
export function parseItemChanges(input: ItemInput): ItemChanges {
  const changes: ItemChanges = {}

  for (const field of ['name', 'unit', 'category'] as const) {
    if (!(field in input)) continue
    const value = readText(input, field)
    if (!value) throw new ValidationError(`${field[0].toUpperCase()}${field.slice(1)} cannot be empty`, field)
    changes[field] = value
  }

  const quantity = parseCount(input.quantity, 'Quantity', 'quantity')
  if (quantity !== null) changes.quantity = quantity

  const alertQuantity = parseCount(input.alertQuantity, 'Alert quantity', 'alertQuantity')
  if (alertQuantity !== null) changes.alertQuantity = alertQuantity

  return changes
}

export function parseQuantity(raw: unknown): number {
  const quantity = parseCount(raw, 'Quantity', 'quantity')
  if (quantity === null) {
    throw new ValidationError('Quantity must be a non-negative integer', 'quantity')
  }
  return quantity
}

export function parseItemId(raw: unknown): number {
  const value = Array.isArray(raw) ? raw[0] : raw
  const id = typeof value === 'string' && DIGITS.test(value.trim()) ? Number.parseInt(value.trim(), 10) : NaN
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError('Invalid item id', 'id')
  }
  return id
}
