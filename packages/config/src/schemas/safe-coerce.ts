import { z } from "zod"

/*
 * Coercions applied before validation. Only lossless conversions are made;
 * anything else is passed through unchanged so the target schema reports it.
 */

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

export function toNumber(value: unknown): unknown {
  if (typeof value !== "string") return value

  const trimmed = value.trim()
  if (!DECIMAL.test(trimmed)) return value

  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : value
}

export function toBoolean(value: unknown): unknown {
  if (value === 0 || value === 1) return value === 1
  if (typeof value !== "string") return value

  const lowered = value.trim().toLowerCase()
  if (lowered === "true") return true
  if (lowered === "false") return false

  return value
}

export function toText(value: unknown): unknown {
  return typeof value === "number" && Number.isFinite(value) ? String(value) : value
}

export function integer() {
  return z.preprocess(toNumber, z.number().int())
}

export function integerBetween(min: number, max: number) {
  return z.preprocess(toNumber, z.number().int().min(min).max(max))
}

export function nonNegativeInteger() {
  return z.preprocess(toNumber, z.number().int().nonnegative())
}

export function number() {
  return z.preprocess(toNumber, z.number())
}

export function flag() {
  return z.preprocess(toBoolean, z.boolean())
}

export function text() {
  return z.preprocess(toText, z.string())
}
