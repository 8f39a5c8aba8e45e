/**
 * dagstats command-line front-end
 *
 * @packageDocumentation
 */

export { mainLedgerStats, runLedgerStats, ExitCode, LEDGER_STATS_USAGE } from "./ledger-stats"
export { mainDagGen, runDagGen, DAG_GEN_USAGE } from "./dag-gen"
export {
  parseLedgerStatsArgs,
  parseDagGenArgs,
  LedgerStatsConfigSchema,
  DagGenConfigSchema,
  LOG_LEVEL_ENV,
} from "./config"
export type { LedgerStatsConfig, DagGenConfig, Invocation, Environment } from "./config"
export { generateBipartiteDag, renderLedger } from "./generator"
export type { GenerateOptions, GeneratedLedger, GeneratedRow } from "./generator"
export { createSeededRandom } from "./random"
export { splitLines, readInputLines } from "./input"
export { withLogging, loggerLayer, makeLineLogger, LOG_LEVEL_NAMES } from "./logging"
export type { LogLevelName } from "./logging"
export { CliError, InputReadError } from "./errors"
export type { CliErrorCode } from "./errors"
export { processIO } from "./io"
export type { CliIO } from "./io"
