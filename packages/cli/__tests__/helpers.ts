/**
 * Shared test helpers
 */

import type { CliIO } from "../src"

export interface CapturedIO extends CliIO {
  out: string[]
  err: string[]
}

/**
 * A CliIO that records every line instead of writing to the process.
 */
export function captureIO(): CapturedIO {
  const out: string[] = []
  const err: string[] = []
  return {
    out,
    err,
    stdout: (line) => {
      out.push(line)
    },
    stderr: (line) => {
      err.push(line)
    },
  }
}
