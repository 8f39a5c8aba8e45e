/**
 * Average transactions per time unit, from the largest timestamp.
 */

import type { Transaction } from "../transaction"
import { toFloat } from "../utils"
import type { Statistic, StatisticReport } from "./types"

export class TimeUnits implements Statistic {
  readonly name = "time-units"

  private maxTimestamp = 0

  accumulate(transaction: Transaction): void {
    this.maxTimestamp = Math.max(this.maxTimestamp, transaction.timestamp)
  }

  result(transactionCount: number): StatisticReport {
    const maxTimestamp = toFloat(this.maxTimestamp)
    return {
      metrics: [{ label: "AVG TXS PER TIME UNIT", value: maxTimestamp / transactionCount }],
    }
  }
}
