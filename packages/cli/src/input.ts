/**
 * Input Reading
 */

import { readFile } from "node:fs/promises"
import { Effect } from "effect"
import { InputReadError } from "./errors"

/**
 * Split text into lines on `\n` or `\r\n`. A trailing newline ends the last
 * line rather than starting an empty one, and empty text has no lines.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return []
  const lines = text.split(/\r?\n/)
  if (lines[lines.length - 1] === "") lines.pop()
  return lines
}

export const readInputLines = (path: string): Effect.Effect<string[], InputReadError> =>
  Effect.tryPromise({
    try: () => readFile(path, "utf8"),
    catch: (cause) => new InputReadError(path, cause),
  }).pipe(Effect.map(splitLines))
