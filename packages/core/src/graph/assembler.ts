/**
 * Graph Assembler
 *
 * Appends transactions one at a time, keeping the reverse index current
 * and checking each reference against the largest identifier the declared
 * count allows.
 */

import { InvalidReferenceError, TransactionSequenceError } from "../errors"
import { FIRST_TRANSACTION_VALUE, ROOT_VALUE, idToNumber } from "../id"
import type { Transaction } from "../transaction"
import { LedgerGraph } from "./graph"
import { ReverseIndex } from "./reverse-index"

export class GraphAssembler {
  private readonly records: Transaction[] = []
  private readonly reverse = new ReverseIndex()

  /** Largest identifier any reference may use */
  readonly max: number

  constructor(readonly declaredCount: number) {
    this.max = declaredCount + ROOT_VALUE
  }

  /** Transactions appended so far */
  get length(): number {
    return this.records.length
  }

  /**
   * @throws TransactionSequenceError | InvalidReferenceError
   */
  append(transaction: Transaction): void {
    const expected = this.records.length + FIRST_TRANSACTION_VALUE
    const value = transaction.id.value
    if (value !== expected) {
      throw new TransactionSequenceError(expected, value)
    }

    const left = idToNumber(transaction.left)
    if (left > this.max) {
      throw new InvalidReferenceError("left", value, left, this.max)
    }

    const right = idToNumber(transaction.right)
    if (right > this.max) {
      throw new InvalidReferenceError("right", value, right, this.max)
    }

    this.reverse.add(transaction.left, transaction.id)
    this.reverse.add(transaction.right, transaction.id)
    this.records.push(transaction)
  }

  finish(): LedgerGraph {
    return new LedgerGraph(this.records, this.reverse)
  }
}
