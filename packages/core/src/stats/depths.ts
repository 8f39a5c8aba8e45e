/**
 * Depth statistics: average depth and transactions per distinct depth.
 */

import type { DepthCalculator } from "../depth"
import type { Transaction } from "../transaction"
import { toFloat } from "../utils"
import type { Statistic, StatisticReport } from "./types"

export class Depths implements Statistic {
  readonly name = "depths"

  private sumOfDepths = 0
  private readonly uniqueDepths = new Set<number>()

  /**
   * The calculator's cache is kept for the whole pass; share one instance.
   */
  constructor(private readonly calculator: DepthCalculator) {}

  accumulate(transaction: Transaction): void {
    const depth = this.calculator.depth(transaction.id)
    this.sumOfDepths += depth
    this.uniqueDepths.add(depth)
  }

  result(transactionCount: number): StatisticReport {
    const sumOfDepths = toFloat(this.sumOfDepths)
    const uniqueDepths = toFloat(this.uniqueDepths.size)
    return {
      metrics: [
        { label: "AVG DAG DEPTH", value: sumOfDepths / (transactionCount + 1) },
        { label: "AVG TXS PER DEPTH", value: transactionCount / uniqueDepths },
      ],
    }
  }
}
