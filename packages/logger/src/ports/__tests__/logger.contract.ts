import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ module: "config" }).child({ section: "camera" })

      child.info("section validated")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ module: "config", section: "camera" })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "config" }).child({ module: "files" }).info("hello")

      expect(read()[0]?.payload.module).toBe("files")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "config" })
      const child = parent.child({ path: "/srv/config.json" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("path")
      expect(logs[1]?.payload).toMatchObject({ module: "config", path: "/srv/config.json" })
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ section: "camera" }).warn("ignored", { section: "lights" })

      expect(read()[0]?.payload.section).toBe("lights")
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read, clear } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])

      clear()
      expect(read()).toEqual([])
    })
  })
}
