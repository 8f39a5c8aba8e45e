/**
 * dagstats core
 *
 * Structural checks and descriptive statistics for a DAG-shaped ledger:
 * a Root vertex plus transactions that each reference two earlier vertices.
 *
 * @example
 * ```typescript
 * import { analyzeLedger, formatReport } from "@dagstats/core"
 *
 * const analysis = analyzeLedger(["2", "1 1 0", "2 1 4"])
 * if (analysis.status === "ok") {
 *   for (const report of analysis.reports) console.log(formatReport(report))
 * }
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// IDENTIFIERS & TRANSACTIONS
// =============================================================================

export {
  ROOT_VALUE,
  FIRST_TRANSACTION_VALUE,
  Root,
  transactionId,
  id,
  idToNumber,
  isRoot,
  idEquals,
  formatId,
} from "./id"
export type { Id, RootId, TransactionId } from "./id"

export { createTransaction, parseTransaction, formatTransaction } from "./transaction"
export type { Transaction } from "./transaction"

// =============================================================================
// GRAPH
// =============================================================================

export { LedgerGraph, GraphAssembler, ReverseIndex, buildGraph } from "./graph"

// =============================================================================
// ANALYSIS
// =============================================================================

export { isConnectedAcyclic, isBipartite } from "./validation"
export { DepthCalculator } from "./depth"
export {
  Depths,
  InReferences,
  TimeUnits,
  Timestamps,
  collectStatistics,
  defaultStatistics,
  formatMetric,
  formatReport,
  toHundredths,
} from "./stats"
export type { Statistic, StatisticReport, Metric } from "./stats"

export { analyzeLedger } from "./pipeline"
export type { AnalyzeOptions, LedgerAnalysis, StructureReport } from "./pipeline"

// =============================================================================
// ERRORS & UTILITIES
// =============================================================================

export {
  LedgerError,
  IdentifierError,
  IntegerParseError,
  TransactionParseError,
  GraphFormatError,
  MissingCountError,
  InvalidCountError,
  TransactionCountError,
  InvalidTransactionError,
  InvalidReferenceError,
  TransactionSequenceError,
  NumericConversionError,
  CyclicGraphError,
  UnknownTransactionError,
} from "./errors"
export type {
  IdentifierErrorKind,
  IntegerParseFailure,
  TransactionErrorKind,
  GraphFormatErrorKind,
  ReferenceSide,
} from "./errors"

export { parseUnsigned, toFloat } from "./utils"
