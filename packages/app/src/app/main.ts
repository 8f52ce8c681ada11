#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { renderAppError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire the jsonval program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): "renderAppError produces the one-line text the CLI writes to stderr"
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode 0 on success, 1 on AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: every AppError is reported on stderr exactly once
// COMPLEXITY: O(1)

const main = runCli(process.argv).pipe(
  Effect.flatMap((result) =>
    Effect.sync(() => {
      process.exitCode = result.exitCode
    })
  ),
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${renderAppError(error)}\n`)
      process.exitCode = 1
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
