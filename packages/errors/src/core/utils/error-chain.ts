function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the error cause chain and return all values encountered.
 *
 * Stops at `maxDepth` entries (default 50) and on the first cycle.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * Render an error and its causes as text, one block per link.
 *
 * Errors with a stack contribute their stack; other errors contribute
 * `name: message`; non-error values are stringified.
 */
export function describeErrorChain(err: unknown, maxDepth?: number): string[] {
  return errorChain(err, maxDepth).map((link, index) => {
    const prefix = index === 0 ? "" : "Caused by: "

    if (link instanceof Error) {
      return prefix + (link.stack ?? `${link.name}: ${link.message}`)
    }

    return prefix + String(link)
  })
}
