/**
 * Depth Calculator
 *
 * depth(Root) = 0
 * depth(t)    = 1 + min(depth(t.left), depth(t.right))
 *
 * Results are memoised per transaction so shared ancestors are resolved
 * once however many descendants ask for them. Resolution uses an explicit
 * stack; a reference back onto the path being resolved is a cycle.
 */

import { CyclicGraphError, UnknownTransactionError } from "../errors"
import { idToNumber, isRoot, type Id } from "../id"
import type { LedgerGraph } from "../graph"
import type { Transaction } from "../transaction"

export class DepthCalculator {
  /** Transaction value -> depth */
  private readonly cache = new Map<number, number>()

  constructor(private readonly graph: LedgerGraph) {}

  /** Number of transactions whose depth is known */
  get cachedCount(): number {
    return this.cache.size
  }

  /**
   * @throws CyclicGraphError if the references below `identifier` loop
   * @throws UnknownTransactionError if a reference names a missing transaction
   */
  depth(identifier: Id): number {
    if (isRoot(identifier)) return 0
    return this.resolve(identifier.value)
  }

  private resolve(start: number): number {
    const known = this.cache.get(start)
    if (known !== undefined) return known

    const stack: number[] = [start]
    const onPath = new Set<number>()

    while (stack.length > 0) {
      const current = stack[stack.length - 1]
      if (this.cache.has(current)) {
        stack.pop()
        continue
      }

      const transaction = this.lookup(current)
      const pending = this.unresolved(transaction)

      if (pending.length === 0) {
        const left = this.known(transaction.left)
        const right = this.known(transaction.right)
        this.cache.set(current, 1 + Math.min(left, right))
        onPath.delete(current)
        stack.pop()
        continue
      }

      onPath.add(current)
      for (const reference of pending) {
        if (onPath.has(reference)) {
          throw new CyclicGraphError(current, reference)
        }
        stack.push(reference)
      }
    }

    return this.known(this.lookup(start).id)
  }

  private lookup(value: number): Transaction {
    const transaction = this.graph.get(value)
    if (!transaction) {
      throw new UnknownTransactionError(value)
    }
    return transaction
  }

  private unresolved(transaction: Transaction): number[] {
    const pending: number[] = []
    for (const reference of [transaction.left, transaction.right]) {
      if (isRoot(reference)) continue
      if (!this.cache.has(reference.value)) pending.push(reference.value)
    }
    return pending
  }

  private known(identifier: Id): number {
    if (isRoot(identifier)) return 0
    const depth = this.cache.get(idToNumber(identifier))
    if (depth === undefined) {
      throw new UnknownTransactionError(identifier.value)
    }
    return depth
  }
}
