/**
 * Statistics Module
 */

export { Depths } from "./depths"
export { InReferences } from "./in-references"
export { TimeUnits } from "./time-units"
export { Timestamps } from "./timestamps"
export { collectStatistics, defaultStatistics } from "./collect"
export { formatMetric, formatReport, toHundredths } from "./format"
export type { Statistic, StatisticReport, Metric } from "./types"
