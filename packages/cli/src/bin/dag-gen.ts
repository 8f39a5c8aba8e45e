#!/usr/bin/env tsx
import process from "node:process"

import { Effect } from "effect"

import { mainDagGen } from "../dag-gen"
import { describeCause } from "../errors"
import { processIO } from "../io"

Effect.runPromise(mainDagGen(process.argv.slice(2), process.env, processIO))
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((cause: unknown) => {
    processIO.stderr(`error: ${describeCause(cause)}`)
    process.exitCode = 1
  })
