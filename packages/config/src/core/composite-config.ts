import { NotFoundError } from "@fieldkit/errors"
import type { ICompositeConfig } from "../ports/config"

export class CompositeConfig<T> implements ICompositeConfig<T> {
  constructor(
    private readonly data: T,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly unknown: readonly string[],
  ) {
    Object.freeze(this.data)
    Object.freeze(this.provenance)
  }

  get value(): Readonly<T> {
    return this.data
  }

  get<K extends keyof T & string>(section: K): NonNullable<T[K]> {
    const value = this.data[section]

    if (value === undefined || value === null) {
      throw new NotFoundError(`Configuration section "${section}" was not loaded`, {
        context: { section },
      })
    }

    return value
  }

  has(section: string): boolean {
    return this.sections().some((name) => name === section)
  }

  sections(): (keyof T & string)[] {
    const data = this.data
    if (typeof data !== "object" || data === null) return []

    return Object.keys(data).filter((key): key is keyof T & string => isSectionOf(data, key))
  }

  explain(section: string): string | undefined {
    return this.has(section) ? this.provenance[section] : undefined
  }

  sourcesUsed(): string[] {
    return [...new Set(this.sections().map((section) => this.provenance[section]))].filter(
      (name): name is string => name !== undefined,
    )
  }

  unknownSections(): string[] {
    return [...this.unknown]
  }
}

function isSectionOf<T extends object>(data: T, key: string): key is keyof T & string {
  return Object.hasOwn(data, key) && Reflect.get(data, key) !== undefined
}
