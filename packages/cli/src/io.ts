/**
 * Output channels of a command run: results go to stdout, logs and usage
 * errors to stderr.
 */

import process from "node:process"

export interface CliIO {
  stdout(line: string): void
  stderr(line: string): void
}

export const processIO: CliIO = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`)
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`)
  },
}
