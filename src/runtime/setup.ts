import type { Logger } from "pino"

import type { CommandOptions } from "../cli/command.js"
import { resolveDevstackSettings } from "../config/devstack-settings.js"
import { createCommandRunner, type CommandRunner } from "../host/command-runner.js"
import type { FetchLike } from "../host/http-probe.js"
import { resolveHostPlatform, type HostPlatform } from "../host/platform.js"
import { createInitialPipelineState, runProvisioningPipeline } from "../provisioning/pipeline.js"
import { buildSetupSummary, listLocalModels } from "../provisioning/summary.js"
import type { PipelineState } from "../provisioning/types.js"
import { resolvePrompter, type Prompter } from "../prompts/prompter.js"

export type SetupDependencies = {
  runner: CommandRunner
  fetch: FetchLike
  prompter: Prompter | null
  environment: NodeJS.ProcessEnv
  platform: HostPlatform
  cwd: string
  writeLine: (line: string) => void
}

const createDefaultSetupDependencies = (): SetupDependencies => {
  return {
    runner: createCommandRunner(),
    fetch: globalThis.fetch,
    prompter: resolvePrompter(),
    environment: process.env,
    platform: resolveHostPlatform(),
    cwd: process.cwd(),
    // eslint-disable-next-line no-console
    writeLine: (line) => console.log(line),
  }
}

/**
 * Provisions the development environment end to end and prints the next steps.
 *
 * @param logger Command-scoped logger for setup telemetry.
 * @param options Parsed CLI options.
 * @param dependencies Host capabilities, overridden in tests.
 * @returns Final pipeline state for diagnostics and tests.
 */
export const runSetup = async (
  logger: Logger,
  options: CommandOptions = {},
  dependencies: SetupDependencies = createDefaultSetupDependencies()
): Promise<PipelineState> => {
  const settings = resolveDevstackSettings(
    dependencies.environment,
    { projectDirectory: options.projectDirectory },
    dependencies.cwd
  )

  logger.info(
    { projectDirectory: settings.projectDirectory, platform: dependencies.platform },
    "Development setup: local LLM + OpenAI API"
  )

  const state = await runProvisioningPipeline(
    createInitialPipelineState(settings.projectDirectory, dependencies.platform),
    {
      runner: dependencies.runner,
      fetch: dependencies.fetch,
      prompter: dependencies.prompter,
      environment: dependencies.environment,
      settings,
      logger,
    }
  )

  const localModels = await listLocalModels(
    dependencies.runner,
    state.report?.ollama.present ?? false
  )

  for (const line of buildSetupSummary(state, localModels)) {
    dependencies.writeLine(line)
  }

  logger.info(
    {
      command: "setup",
      configPath: state.configPath,
      launchers: state.launchers.length,
      warnings: state.warnings.length,
    },
    "Setup completed"
  )

  return state
}
