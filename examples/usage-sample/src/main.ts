import { run } from "./run"

const result = await run({ env: process.env, argv: process.argv.slice(2) })

if (!result.ok) {
  for (const failure of result.failures) {
    console.error(`${failure.logger} (${failure.sink}) did not shut down cleanly`, failure.error)
  }
  process.exitCode = 1
}
