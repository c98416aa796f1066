import type { ConfigSource } from "../../ports/source"

/** In-memory sections, typically overrides applied after a file source. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly obj: Record<string, unknown>,
    readonly name = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
