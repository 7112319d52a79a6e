#!/usr/bin/env node
import { buildBootstrapMessage } from "./bootstrap/message.js"
import { parseCommand } from "./cli/command.js"
import { runCommand } from "./cli/runner.js"
import { DevstackError } from "./errors.js"
import { createComponentLogger, logger } from "./logging/logger.js"
import { runCheck } from "./runtime/check.js"
import { runSetup } from "./runtime/setup.js"
import { runStart } from "./runtime/start.js"
import { getAppVersion } from "./version.js"

const startedAt = new Date().toISOString()

logger.debug({ startedAt }, buildBootstrapMessage(startedAt, getAppVersion()))

const main = async (): Promise<void> => {
  const { command, options } = parseCommand(process.argv.slice(2))
  const commandLogger = createComponentLogger(command)

  await runCommand(command, options, commandLogger, {
    setup: runSetup,
    start: runStart,
    check: runCheck,
  })
}

main().catch((error: unknown) => {
  if (error instanceof DevstackError) {
    logger.error({ error: error.message, code: error.code, hint: error.hint }, "devstack failed")
  } else {
    logger.error(
      { error: error instanceof Error ? error.message : String(error) },
      "devstack failed"
    )
  }

  process.exitCode = 1
})
