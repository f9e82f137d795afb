import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import { FakeClock } from "@logsmith/clock"
import { describeSinkContract } from "../../../ports/__tests__/sink.contract"
import { MemoryDiagnostics } from "../../diagnostics/memory-diagnostics"
import { RotatingFileSink } from "../rotating-file-sink"

describeSinkContract({
  name: "RotatingFileSink",
  make: async ({ level }) => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "logsmith-file-"))
    const file = path.join(dir, "app.log")

    const sink = new RotatingFileSink(
      { path: file, level, timeZone: "utc", maxBytes: 0, backupCount: 0, encoding: "utf8" },
      { clock: new FakeClock(), diagnostics: new MemoryDiagnostics() },
    )

    return {
      sink,
      read: async () => (await fs.readFile(file, "utf8")).split("\n").filter((l) => l !== ""),
      cleanup: async () => {
        await sink.close()
        await fs.rm(dir, { recursive: true, force: true })
      },
    }
  },
})
