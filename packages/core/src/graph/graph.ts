/**
 * Ledger Graph
 *
 * The ordered transaction sequence plus its reverse reference index.
 * A graph is read-only once assembled; validators, the depth calculator
 * and statistics all borrow it without copying.
 */

import { FIRST_TRANSACTION_VALUE, ROOT_VALUE, idToNumber, type Id } from "../id"
import type { Transaction } from "../transaction"
import { ReverseIndex } from "./reverse-index"
import { GraphAssembler } from "./assembler"

export class LedgerGraph {
  /**
   * @internal Use `buildGraph` or `LedgerGraph.fromTransactions`.
   */
  constructor(
    private readonly records: readonly Transaction[],
    private readonly reverse: ReverseIndex,
  ) {}

  /**
   * Assemble a graph from already-parsed records.
   * Ids must run 2, 3, 4, ... and every reference must be at most `length + 1`.
   * @throws TransactionSequenceError | InvalidReferenceError
   */
  static fromTransactions(transactions: Iterable<Transaction>): LedgerGraph {
    const records = [...transactions]
    const assembler = new GraphAssembler(records.length)
    for (const transaction of records) {
      assembler.append(transaction)
    }
    return assembler.finish()
  }

  /** Number of transactions, Root excluded */
  get size(): number {
    return this.records.length
  }

  /** Largest identifier value in the graph (Root counts as 1) */
  get maxId(): number {
    return this.records.length + ROOT_VALUE
  }

  /** Transactions in id order */
  get transactions(): readonly Transaction[] {
    return this.records
  }

  /**
   * Look up a transaction by identifier value or `TransactionId`.
   */
  get(identifier: Id | number): Transaction | undefined {
    const value = typeof identifier === "number" ? identifier : idToNumber(identifier)
    if (value < FIRST_TRANSACTION_VALUE) return undefined
    return this.records[value - FIRST_TRANSACTION_VALUE]
  }

  /**
   * Identifier values of the transactions that reference `target`.
   */
  referrers(target: Id | number): ReadonlySet<number> {
    return this.reverse.sources(target)
  }

  /**
   * Number of left and right references `target` receives.
   */
  referenceCount(target: Id | number): number {
    return this.reverse.count(target)
  }
}
