import { Command, CommanderError, InvalidArgumentError } from "commander"

export type DevstackCommand = "setup" | "start" | "check"

export type CommandOptions = {
  projectDirectory?: string
}

export type ParsedCommand = {
  command: DevstackCommand
  options: CommandOptions
}

const VALID_COMMANDS = ["setup", "start", "check"] as const

const isDevstackCommand = (value: string): value is DevstackCommand => {
  return VALID_COMMANDS.some((command) => command === value)
}

/**
 * Centralizes command validation in one parser so the entry point only dispatches.
 *
 * @param argv Raw user arguments from process argv.
 * @returns Selected command, defaulting to `setup` for zero-arg startup.
 */
export const parseCommand = (argv: string[]): ParsedCommand => {
  const parser = new Command()

  parser
    .name("devstack")
    .exitOverride()
    .allowUnknownOption(false)
    .allowExcessArguments(false)
    .option("--project-dir <path>", "project root containing package.json and backend/")
    .argument(
      "[command]",
      "setup | start | check",
      (value: string): DevstackCommand => {
        if (!isDevstackCommand(value)) {
          throw new InvalidArgumentError(
            `Unknown command: ${value}. Valid commands: ${VALID_COMMANDS.join(", ")}`
          )
        }

        return value
      },
      "setup"
    )

  try {
    parser.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new Error(error.message)
    }

    if (error instanceof Error) {
      throw error
    }

    throw new Error("Unknown command parsing error")
  }

  const [command] = parser.processedArgs
  const { projectDir } = parser.opts<{ projectDir?: string }>()

  return {
    command: typeof command === "string" && isDevstackCommand(command) ? command : "setup",
    options: { projectDirectory: projectDir },
  }
}
