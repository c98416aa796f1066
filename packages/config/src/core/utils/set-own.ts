/**
 * Assign `record[key] = value` as an own, enumerable property. Document keys
 * such as `__proto__` become ordinary entries instead of reaching the
 * prototype setter.
 */
export function setOwn<V>(record: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  })
}
