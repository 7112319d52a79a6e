import type { Logger } from "pino"

import { MissingMandatoryToolError } from "../errors.js"
import type { CommandRunner } from "../host/command-runner.js"
import type { PrerequisiteReport, ToolName, ToolStatus } from "./types.js"

type ToolDefinition = {
  name: ToolName
  label: string
  candidates: string[]
  mandatory: boolean
  installHint: string
}

const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: "node",
    label: "Node.js",
    candidates: ["node"],
    mandatory: true,
    installHint: "Please install Node.js 18.13.0 - 22.x.x",
  },
  {
    name: "npm",
    label: "npm",
    candidates: ["npm"],
    mandatory: true,
    installHint: "Please install npm 6.0.0+",
  },
  {
    name: "python",
    label: "Python",
    candidates: ["python3", "python"],
    mandatory: true,
    installHint: "Please install Python 3.11+",
  },
  {
    name: "ollama",
    label: "Ollama",
    candidates: ["ollama"],
    mandatory: false,
    installHint: "Install Ollama from https://ollama.ai/",
  },
]

const ABSENT: ToolStatus = Object.freeze({ present: false })

// Older interpreters print their version on stderr.
const firstLine = (...outputs: string[]): string | undefined => {
  for (const output of outputs) {
    const line = output
      .split(/\r?\n/)
      .map((value) => value.trim())
      .find((value) => value.length > 0)

    if (line) {
      return line
    }
  }

  return undefined
}

const detectTool = async (
  runner: CommandRunner,
  definition: ToolDefinition
): Promise<ToolStatus> => {
  for (const candidate of definition.candidates) {
    const result = await runner.run(candidate, ["--version"])

    if (result.exitCode === 0) {
      return Object.freeze({
        present: true,
        version: firstLine(result.stdout, result.stderr),
        command: candidate,
      })
    }
  }

  return ABSENT
}

/**
 * Probes every known tool once. The returned report is frozen; callers that need to see
 * the effect of an installation run a new detection pass.
 */
export const detectPrerequisites = async (
  runner: CommandRunner,
  logger: Logger
): Promise<PrerequisiteReport> => {
  const detected = new Map<ToolName, ToolStatus>()

  for (const definition of TOOL_DEFINITIONS) {
    const status = await detectTool(runner, definition)
    detected.set(definition.name, status)

    if (status.present) {
      logger.info(
        { tool: definition.name, version: status.version ?? null, command: status.command },
        `${definition.label} found`
      )
    } else if (definition.mandatory) {
      logger.error({ tool: definition.name }, `${definition.label} not found`)
    } else {
      logger.warn(
        { tool: definition.name },
        `${definition.label} not found, will try to install it`
      )
    }
  }

  const statusOf = (name: ToolName): ToolStatus => detected.get(name) ?? ABSENT

  return Object.freeze({
    node: statusOf("node"),
    npm: statusOf("npm"),
    python: statusOf("python"),
    ollama: statusOf("ollama"),
  })
}

/**
 * Halts on the first missing mandatory tool, in detection order.
 */
export const assertMandatoryTools = (report: PrerequisiteReport): void => {
  for (const definition of TOOL_DEFINITIONS) {
    if (definition.mandatory && !report[definition.name].present) {
      throw new MissingMandatoryToolError(definition.name, definition.label, definition.installHint)
    }
  }
}
