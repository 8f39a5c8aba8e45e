/**
 * Bipartiteness
 *
 * Two-colouring over reverse edges starting from Root. Each step from a
 * vertex to one of its referrers flips the colour.
 */

import { ROOT_VALUE } from "../id"
import type { LedgerGraph } from "../graph"

const UNCOLORED = -1

/**
 * Check whether the reverse-edge graph reachable from Root is two-colourable.
 *
 * Meant to run after `isConnectedAcyclic` returned `true`: vertices Root
 * cannot reach are never coloured and never checked.
 */
export function isBipartite(graph: LedgerGraph): boolean {
  const colors = new Int8Array(graph.maxId + 1).fill(UNCOLORED)
  const pending: number[] = [ROOT_VALUE]
  colors[ROOT_VALUE] = 0

  while (pending.length > 0) {
    const vertex = pending.pop()
    if (vertex === undefined) break

    const expected = 1 - colors[vertex]
    for (const referrer of graph.referrers(vertex)) {
      const color = colors[referrer]
      if (color === UNCOLORED) {
        colors[referrer] = expected
        pending.push(referrer)
      } else if (color !== expected) {
        return false
      }
    }
  }

  return true
}
