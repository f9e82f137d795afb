import { makeRecord } from "../../tests/utils/records"
import type { SinkHarness } from "./sink-harness"

export function describeSinkContract(h: SinkHarness) {
  describe(`Sink contract: ${h.name}`, () => {
    let cleanup: (() => Promise<void>) | undefined

    afterEach(async () => {
      await cleanup?.()
      cleanup = undefined
    })

    async function make(level: Parameters<SinkHarness["make"]>[0]["level"]) {
      const made = await h.make({ level })
      cleanup = made.cleanup
      return made
    }

    it("exposes its level", async () => {
      const { sink } = await make("WARNING")

      expect(sink.level).toBe("WARNING")
    })

    it("is verbose exactly when its level is DEBUG", async () => {
      expect((await make("DEBUG")).sink.verbose).toBe(true)
      await cleanup?.()

      expect((await make("INFO")).sink.verbose).toBe(false)
    })

    it("delivers a written record once flushed", async () => {
      const { sink, read } = await make("INFO")

      sink.write(makeRecord({ message: "contract message" }))
      await sink.flush()

      const lines = await read()

      expect(lines).toHaveLength(1)
      expect(lines[0]).toContain("app - INFO - contract message")
    })

    it("keeps write order", async () => {
      const { sink, read } = await make("INFO")

      sink.write(makeRecord({ message: "first" }))
      sink.write(makeRecord({ message: "second" }))
      await sink.flush()

      const lines = await read()

      expect(lines).toHaveLength(2)
      expect(lines[0]).toContain("first")
      expect(lines[1]).toContain("second")
    })

    it("flush() resolves when nothing was written", async () => {
      const { sink } = await make("INFO")

      await expect(sink.flush()).resolves.toBeUndefined()
    })

    it("drops writes after close()", async () => {
      const { sink, read } = await make("INFO")

      sink.write(makeRecord({ message: "before" }))
      await sink.close()
      sink.write(makeRecord({ message: "after" }))

      const lines = await read()

      expect(lines).toHaveLength(1)
      expect(lines[0]).toContain("before")
    })

    it("close() can be called twice", async () => {
      const { sink } = await make("INFO")

      await sink.close()
      await expect(sink.close()).resolves.toBeUndefined()
    })
  })
}
