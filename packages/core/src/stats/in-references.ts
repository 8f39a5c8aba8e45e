/**
 * Fan-in statistics: average number of references a vertex receives.
 */

import { Root } from "../id"
import type { LedgerGraph } from "../graph"
import type { Transaction } from "../transaction"
import { toFloat } from "../utils"
import type { Statistic, StatisticReport } from "./types"

export class InReferences implements Statistic {
  readonly name = "in-references"

  /** Unset until the first transaction, which also folds in Root's own count */
  private totalReferences: number | undefined

  constructor(private readonly graph: LedgerGraph) {}

  accumulate(transaction: Transaction): void {
    const references = this.graph.referenceCount(transaction.id)
    this.totalReferences =
      this.totalReferences === undefined
        ? this.graph.referenceCount(Root) + references
        : this.totalReferences + references
  }

  result(transactionCount: number): StatisticReport {
    const totalReferences = toFloat(this.totalReferences ?? 0)
    return {
      metrics: [{ label: "AVG REF", value: totalReferences / (transactionCount + 1) }],
    }
  }
}
