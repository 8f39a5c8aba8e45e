/**
 * Fixture Generator
 *
 * Produces random ledger inputs that are connected, acyclic and bipartite.
 * Root is red. Each new vertex flips a coin for its colour and references
 * two (possibly equal) vertices of the other colour, so every reference
 * crosses colours and points backwards.
 */

export interface GenerateOptions {
  /** Number of transactions, Root excluded; at least 1 */
  vertices: number
  /** Uniform source in [0, 1) */
  random?: () => number
}

export interface GeneratedRow {
  left: number
  right: number
  timestamp: number
}

export interface GeneratedLedger {
  rows: GeneratedRow[]
  /** Identifier values per colour; Root (1) is red */
  reds: number[]
  blues: number[]
}

export function generateBipartiteDag(options: GenerateOptions): GeneratedLedger {
  const { vertices } = options
  const random = options.random ?? Math.random
  if (!Number.isInteger(vertices) || vertices < 1) {
    throw new RangeError(`vertices must be a positive integer, got ${vertices}`)
  }

  // [low, high)
  const between = (low: number, high: number): number => low + Math.floor(random() * (high - low))

  // timestamps[value - 1]; Root sits at 0
  const timestamps: number[] = [0]
  const rows: GeneratedRow[] = []
  const reds: number[] = [1]
  const blues: number[] = [2]

  const first = between(0, 100)
  rows.push({ left: 1, right: 1, timestamp: first })
  timestamps.push(first)

  for (let value = 3; value <= vertices + 1; value += 1) {
    const red = random() < 0.5
    const parents = red ? blues : reds

    const left = parents[between(0, parents.length)]
    const right = parents[between(0, parents.length)]

    const floor = Math.max(timestamps[left - 1], timestamps[right - 1]) + between(1, 100)
    const ceiling = floor + between(1, 100)
    const timestamp = between(floor, ceiling + 1)

    rows.push({ left, right, timestamp })
    timestamps.push(timestamp)
    ;(red ? reds : blues).push(value)
  }

  return { rows, reds, blues }
}

/**
 * Render in the ledger input format: the count line, then one row per line.
 */
export function renderLedger(ledger: GeneratedLedger): string[] {
  return [String(ledger.rows.length), ...ledger.rows.map((row) => `${row.left} ${row.right} ${row.timestamp}`)]
}
