#!/usr/bin/env tsx
import process from "node:process"

import { Effect } from "effect"

import { describeCause } from "../errors"
import { processIO } from "../io"
import { mainLedgerStats } from "../ledger-stats"

Effect.runPromise(mainLedgerStats(process.argv.slice(2), process.env, processIO))
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((cause: unknown) => {
    processIO.stderr(`error: ${describeCause(cause)}`)
    process.exitCode = 1
  })
