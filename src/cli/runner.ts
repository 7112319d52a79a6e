import type { Logger } from "pino"

import type { CommandOptions, DevstackCommand } from "./command.js"

type CommandHandler = (logger: Logger, options: CommandOptions) => Promise<unknown>

type CommandHandlers = Record<DevstackCommand, CommandHandler>

export const runCommand = async (
  command: DevstackCommand,
  options: CommandOptions,
  logger: Logger,
  handlers: CommandHandlers
): Promise<void> => {
  await handlers[command](logger, options)
}
