/**
 * Ledger Analysis Pipeline
 *
 * read count -> parse lines -> validate structure -> statistics pass.
 *
 * Every expected failure comes back as a tagged outcome so a front-end can
 * choose its own messages and exit codes. Errors from the line source are
 * not expected failures and propagate.
 */

import { CyclicGraphError, GraphFormatError, NumericConversionError } from "../errors"
import { buildGraph, type LedgerGraph } from "../graph"
import { collectStatistics, defaultStatistics, type Statistic, type StatisticReport } from "../stats"
import { isBipartite, isConnectedAcyclic } from "../validation"

export interface AnalyzeOptions {
  /** Run the structural validators before the statistics (default: true) */
  validate?: boolean
  /** Statistics to run instead of the four defaults */
  statistics?: (graph: LedgerGraph) => Statistic[]
}

export interface StructureReport {
  /** Always true in a successful analysis; cyclic and disconnected graphs stop the pipeline */
  connectedAcyclic: true
  bipartite: boolean
}

export type LedgerAnalysis =
  | {
      status: "ok"
      graph: LedgerGraph
      /** Undefined when validation was skipped */
      structure: StructureReport | undefined
      reports: StatisticReport[]
    }
  | { status: "invalid-format"; error: GraphFormatError }
  | { status: "cyclic"; graph: LedgerGraph }
  | { status: "disconnected"; graph: LedgerGraph }
  | { status: "computation-failed"; graph: LedgerGraph; error: NumericConversionError | CyclicGraphError }

export function analyzeLedger(lines: Iterable<string>, options: AnalyzeOptions = {}): LedgerAnalysis {
  const validate = options.validate ?? true
  const makeStatistics = options.statistics ?? defaultStatistics

  let graph: LedgerGraph
  try {
    graph = buildGraph(lines)
  } catch (error) {
    if (error instanceof GraphFormatError) {
      return { status: "invalid-format", error }
    }
    throw error
  }

  let structure: StructureReport | undefined
  if (validate) {
    const verdict = isConnectedAcyclic(graph)
    if (verdict === false) return { status: "cyclic", graph }
    if (verdict === undefined) return { status: "disconnected", graph }
    structure = { connectedAcyclic: true, bipartite: isBipartite(graph) }
  }

  try {
    const reports = collectStatistics(graph, makeStatistics(graph))
    return { status: "ok", graph, structure, reports }
  } catch (error) {
    if (error instanceof NumericConversionError || error instanceof CyclicGraphError) {
      return { status: "computation-failed", graph, error }
    }
    throw error
  }
}
