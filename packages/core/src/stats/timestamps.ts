/**
 * Average transactions per distinct timestamp.
 */

import type { Transaction } from "../transaction"
import { toFloat } from "../utils"
import type { Statistic, StatisticReport } from "./types"

export class Timestamps implements Statistic {
  readonly name = "timestamps"

  private readonly uniqueTimestamps = new Set<number>()

  accumulate(transaction: Transaction): void {
    this.uniqueTimestamps.add(transaction.timestamp)
  }

  result(transactionCount: number): StatisticReport {
    const uniqueTimestamps = toFloat(this.uniqueTimestamps.size)
    return {
      metrics: [{ label: "AVG TXS PER TIMESTAMP", value: transactionCount / uniqueTimestamps }],
    }
  }
}
