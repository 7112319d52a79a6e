import pino, { type Logger } from "pino"

import { buildLoggerOptions, resolveRuntimeEnv, type RuntimeEnv } from "./options.js"

type CreateLoggerInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
}

/**
 * Creates logger instances from one shared policy surface so every pipeline step and the
 * supervisor emit consistent metadata and formatting.
 *
 * @param input Optional logger overrides for embedding and tests.
 * @returns Configured Pino logger.
 */
export const createLogger = (input: CreateLoggerInput = {}): Logger => {
  const env = input.env ?? resolveRuntimeEnv()
  const prettyLogs = input.prettyLogs ?? process.env.DEVSTACK_PRETTY_LOGS === "1"
  const logLevel = input.logLevel ?? (process.env.DEVSTACK_LOG_LEVEL?.trim() || undefined)
  const options = buildLoggerOptions({
    env,
    logLevel,
    serviceName: input.serviceName,
    prettyLogs,
  })

  return pino(options)
}

export const logger = createLogger()

/**
 * Uses child loggers to preserve component context in every line, which keeps the
 * interleaved output of setup steps and supervised jobs readable.
 *
 * @param component Logical component name attached to each record.
 * @param parent Parent logger used to inherit base runtime fields.
 * @returns Component-scoped logger.
 */
export const createComponentLogger = (component: string, parent: Logger = logger): Logger => {
  return parent.child({ component })
}
