/**
 * Shared test helpers
 */

import { LedgerGraph, createTransaction, id, transactionId } from "../src"

/**
 * Run `fn` and return what it throws; fails the test if nothing is thrown.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error("expected an error to be thrown")
}

/**
 * Build a graph from `[left, right, timestamp]` rows; row `i` becomes Tx:(i + 2).
 */
export function graphOf(rows: Array<[number, number, number]>): LedgerGraph {
  return LedgerGraph.fromTransactions(
    rows.map(([left, right, timestamp], index) =>
      createTransaction(transactionId(index + 2), id(left), id(right), timestamp),
    ),
  )
}

/** The five-transaction example ledger used across the suites */
export const EXAMPLE_INPUT = "5\n1 1 0\n1 2 0\n2 2 1\n3 6 3\n3 3 2"

export const EXAMPLE_ROWS: Array<[number, number, number]> = [
  [1, 1, 0],
  [1, 2, 0],
  [2, 2, 1],
  [3, 6, 3],
  [3, 3, 2],
]
