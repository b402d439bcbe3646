import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "config-manager" })
      const child = parent.child({ profile: "dev" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        module: "config-manager",
        profile: "dev",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ profile: "dev" })
      const child = parent.child({ profile: "prod" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.profile).toBe("prod")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ profile: "dev" })
      const child = parent.child({ section: "net" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ profile: "dev" })
      expect(logs[0]?.payload).not.toHaveProperty("section")
      expect(logs[1]?.payload).toMatchObject({ profile: "dev", section: "net" })

      clear()
      expect(read()).toEqual([])
    })

    it("per-call meta is emitted alongside context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ profile: "dev" })
      scoped.info("persisted", { section: "net", option: "port" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        profile: "dev",
        section: "net",
        option: "port",
      })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
