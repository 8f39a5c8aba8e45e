/**
 * Statistics Pass
 *
 * Feeds every transaction, in id order, to every statistic, then
 * finalises each one.
 */

import { DepthCalculator } from "../depth"
import type { LedgerGraph } from "../graph"
import { toFloat } from "../utils"
import { Depths } from "./depths"
import { InReferences } from "./in-references"
import { TimeUnits } from "./time-units"
import { Timestamps } from "./timestamps"
import type { Statistic, StatisticReport } from "./types"

/**
 * The four standard statistics, in output order.
 */
export function defaultStatistics(graph: LedgerGraph): Statistic[] {
  return [new Depths(new DepthCalculator(graph)), new InReferences(graph), new TimeUnits(), new Timestamps()]
}

/**
 * Run one pass over `graph` and return one report per statistic, in order.
 * @throws NumericConversionError | CyclicGraphError
 */
export function collectStatistics(
  graph: LedgerGraph,
  statistics: Statistic[] = defaultStatistics(graph),
): StatisticReport[] {
  for (const transaction of graph.transactions) {
    for (const statistic of statistics) {
      statistic.accumulate(transaction)
    }
  }

  const transactionCount = toFloat(graph.size)
  return statistics.map((statistic) => statistic.result(transactionCount))
}
