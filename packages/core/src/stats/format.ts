/**
 * Report Formatting
 */

import type { Metric, StatisticReport } from "./types"

export function formatMetric(metric: Metric): string {
  return `> ${metric.label}: ${toHundredths(metric.value)}`
}

/**
 * Two decimals, with exact ties going to the even hundredth.
 *
 * A double sits exactly halfway between two hundredths only when it is an
 * odd multiple of 1/8 (0.125, 0.375, ...); `toFixed` rounds those up.
 */
export function toHundredths(value: number): string {
  const eighths = value * 8
  if (!Number.isInteger(eighths) || eighths % 2 === 0) {
    return value.toFixed(2)
  }

  const lower = Math.floor(value * 100)
  const even = lower % 2 === 0 ? lower : lower + 1
  return (even / 100).toFixed(2)
}

/**
 * Render a report as one `> LABEL: X.XX` line per metric.
 */
export function formatReport(report: StatisticReport): string {
  return report.metrics.map(formatMetric).join("\n")
}
