/**
 * Connectivity and Acyclicity
 *
 * Depth-first walk from Root along reverse edges (from a vertex to every
 * transaction that references it), colouring vertices white / gray / black.
 * Meeting a gray vertex means the current path loops back on itself.
 */

import { ROOT_VALUE } from "../id"
import type { LedgerGraph } from "../graph"

const WHITE = 0
const GRAY = 1
const BLACK = 2

interface Frame {
  vertex: number
  referrers: Iterator<number>
}

/**
 * Check that every vertex is reachable from Root and no reference cycle exists.
 *
 * - `true`: connected and acyclic
 * - `false`: a cycle is reachable from Root (reported even if some vertex is also unreachable)
 * - `undefined`: acyclic as far as Root reaches, but some vertex is unreachable
 */
export function isConnectedAcyclic(graph: LedgerGraph): boolean | undefined {
  const colors = new Uint8Array(graph.maxId + 1)
  const stack: Frame[] = []
  let visited = 0

  const enter = (vertex: number): void => {
    colors[vertex] = GRAY
    visited += 1
    stack.push({ vertex, referrers: graph.referrers(vertex).values() })
  }

  enter(ROOT_VALUE)

  while (stack.length > 0) {
    const frame = stack[stack.length - 1]
    const next = frame.referrers.next()

    if (next.done) {
      colors[frame.vertex] = BLACK
      stack.pop()
      continue
    }

    const color = colors[next.value]
    if (color === GRAY) {
      return false
    }
    if (color === WHITE) {
      enter(next.value)
    }
  }

  return visited === graph.size + 1 ? true : undefined
}
