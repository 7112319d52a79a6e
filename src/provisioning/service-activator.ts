import type { Logger } from "pino"

import type { CommandRunner } from "../host/command-runner.js"
import { probeEndpoint, type FetchLike } from "../host/http-probe.js"
import type { Prompter } from "../prompts/prompter.js"
import { localStatusUrl } from "./connectivity.js"
import type { LocalServiceStatus, PipelineWarning } from "./types.js"

type EnsureLocalServiceInput = {
  baseUrl: string
  timeoutMs: number
  runner: CommandRunner
  fetch: FetchLike
  prompter: Prompter | null
  logger: Logger
}

export type LocalServiceActivation = {
  status: LocalServiceStatus
  warnings: PipelineWarning[]
}

const hasServiceManager = async (runner: CommandRunner): Promise<boolean> => {
  const result = await runner.run("systemctl", ["--version"])
  return result.exitCode === 0
}

const waitForManualStart = async (
  prompter: Prompter | null,
  logger: Logger
): Promise<LocalServiceStatus> => {
  logger.warn("Please start Ollama manually: ollama serve")

  if (!prompter) {
    logger.warn("No interactive terminal, continuing without confirmation")
    return "manual-confirmed"
  }

  await prompter.confirm("Press Enter when Ollama is running...")
  return "manual-confirmed"
}

/**
 * Makes one attempt to get the local inference service running. There is no polling: a
 * started unit is assumed to come up, and every other path hands control to the operator.
 */
export const ensureLocalServiceRunning = async ({
  baseUrl,
  timeoutMs,
  runner,
  fetch,
  prompter,
  logger,
}: EnsureLocalServiceInput): Promise<LocalServiceActivation> => {
  logger.info("Checking if Ollama is running...")

  const probe = await probeEndpoint(fetch, localStatusUrl(baseUrl), { timeoutMs })

  if (probe.ok) {
    logger.info({ url: probe.url }, "Ollama is running")
    return { status: "already-running", warnings: [] }
  }

  logger.warn({ url: probe.url, error: probe.error }, "Ollama is not running. Starting Ollama...")

  if (!(await hasServiceManager(runner))) {
    return { status: await waitForManualStart(prompter, logger), warnings: [] }
  }

  const result = await runner.run("sudo", ["systemctl", "start", "ollama"], {
    inheritOutput: true,
  })

  if (result.exitCode === 0) {
    logger.info("Requested Ollama start through systemctl")
    return { status: "service-manager-started", warnings: [] }
  }

  const warning: PipelineWarning = {
    kind: "service-start",
    message: `systemctl start ollama exited with code ${result.exitCode}`,
  }
  logger.warn({ exitCode: result.exitCode }, "Service manager could not start Ollama")

  return { status: await waitForManualStart(prompter, logger), warnings: [warning] }
}
