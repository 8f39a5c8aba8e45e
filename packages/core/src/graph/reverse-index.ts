/**
 * Reverse Reference Index
 *
 * For every referenced vertex, the set of transactions pointing at it and
 * the number of references it receives. A transaction that points at the
 * same vertex twice appears once in the set but counts twice.
 */

import { idToNumber, type Id, type TransactionId } from "../id"

const EMPTY: ReadonlySet<number> = new Set()

interface InReferences {
  /** Referring transaction values */
  sources: Set<number>
  /** Left and right references, counted separately */
  count: number
}

export class ReverseIndex {
  /** Referenced vertex value -> incoming references */
  private readonly entries = new Map<number, InReferences>()

  /**
   * Record that `source` references `target`.
   */
  add(target: Id, source: TransactionId): void {
    const key = idToNumber(target)
    let entry = this.entries.get(key)
    if (!entry) {
      entry = { sources: new Set(), count: 0 }
      this.entries.set(key, entry)
    }
    entry.sources.add(source.value)
    entry.count += 1
  }

  /**
   * Values of the transactions that reference `target`, in insertion order.
   */
  sources(target: Id | number): ReadonlySet<number> {
    return this.entries.get(keyOf(target))?.sources ?? EMPTY
  }

  count(target: Id | number): number {
    return this.entries.get(keyOf(target))?.count ?? 0
  }
}

function keyOf(target: Id | number): number {
  return typeof target === "number" ? target : idToNumber(target)
}
