/**
 * Statistics Types
 */

import type { Transaction } from "../transaction"

/**
 * One labelled average, e.g. `AVG REF`.
 */
export interface Metric {
  label: string
  value: number
}

/**
 * Finalised output of one statistic.
 */
export interface StatisticReport {
  metrics: Metric[]
}

/**
 * A per-transaction aggregation run over a single pass of the graph.
 *
 * `accumulate` is called once per transaction in ascending id order;
 * `result` is called afterwards with the transaction count as a float.
 */
export interface Statistic {
  /** Short name used in logs */
  readonly name: string
  accumulate(transaction: Transaction): void
  /**
   * @throws NumericConversionError when an internal count is not exactly representable
   */
  result(transactionCount: number): StatisticReport
}
