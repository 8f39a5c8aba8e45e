/**
 * Pipeline Module
 */

export { analyzeLedger } from "./analyze"
export type { AnalyzeOptions, LedgerAnalysis, StructureReport } from "./analyze"
