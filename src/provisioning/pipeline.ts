import path from "node:path"

import type { Logger } from "pino"

import {
  BACKEND_DIRECTORY,
  CREDENTIAL_ENV_VAR,
  LOCAL_INFERENCE_BASE_URL,
  REMOTE_API_BASE_URL,
  RUNTIME_CONFIG_FILE,
} from "../config/defaults.js"
import type { DevstackSettings } from "../config/devstack-settings.js"
import { MissingCredentialError } from "../errors.js"
import type { CommandRunner } from "../host/command-runner.js"
import type { FetchLike } from "../host/http-probe.js"
import type { HostPlatform } from "../host/platform.js"
import type { Prompter } from "../prompts/prompter.js"
import { verifyConnectivity } from "./connectivity.js"
import { acquireCredential } from "./credentials.js"
import { installProjectDependencies } from "./dependencies.js"
import { installLocalRuntime } from "./installer.js"
import { renderLauncherScripts, writeLauncherScripts } from "./launchers.js"
import { prefetchModels } from "./model-prefetcher.js"
import { assertMandatoryTools, detectPrerequisites } from "./prerequisites.js"
import { buildRuntimeConfig, writeRuntimeConfig } from "./runtime-config.js"
import { ensureLocalServiceRunning } from "./service-activator.js"
import type { PipelineState, PrerequisiteReport } from "./types.js"

export type PipelineContext = {
  runner: CommandRunner
  fetch: FetchLike
  prompter: Prompter | null
  environment: NodeJS.ProcessEnv
  settings: DevstackSettings
  logger: Logger
}

export type PipelineStep = {
  name: string
  title: string
  run: (state: PipelineState, context: PipelineContext) => Promise<PipelineState>
}

/**
 * Every step reads and returns this value instead of sharing flags, so a step only sees
 * what earlier steps produced.
 *
 * @returns State before any step has run.
 */
export const createInitialPipelineState = (
  projectDirectory: string,
  platform: HostPlatform
): PipelineState => {
  return {
    projectDirectory,
    platform,
    report: null,
    credential: null,
    localServiceStatus: null,
    configPath: null,
    models: [],
    launchers: [],
    endpoints: [],
    warnings: [],
  }
}

const requireReport = (state: PipelineState): PrerequisiteReport => {
  if (!state.report) {
    throw new Error("Prerequisite detection has not run yet")
  }

  return state.report
}

/**
 * Shared by setup, which writes the file, and `check`, which reads the key back from it.
 *
 * @returns Path of `backend/.env.dev` under the project root.
 */
export const resolveRuntimeConfigPath = (projectDirectory: string): string => {
  return path.join(projectDirectory, BACKEND_DIRECTORY, RUNTIME_CONFIG_FILE)
}

const detectStep: PipelineStep = {
  name: "prerequisites",
  title: "Checking prerequisites...",
  run: async (state, { runner, logger }) => {
    const report = await detectPrerequisites(runner, logger)
    assertMandatoryTools(report)

    return { ...state, report }
  },
}

const credentialStep: PipelineStep = {
  name: "credential",
  title: "Resolving OpenAI API key...",
  run: async (state, { environment, prompter, logger }) => {
    const credential = await acquireCredential({ environment, prompter, logger })

    return { ...state, credential }
  },
}

const localRuntimeStep: PipelineStep = {
  name: "local-runtime",
  title: "Ensuring Ollama is installed...",
  run: async (state, { runner, fetch, logger }) => {
    const report = requireReport(state)

    if (report.ollama.present) {
      logger.debug("Ollama already installed")
      return state
    }

    await installLocalRuntime(state.platform, { runner, fetch, logger })

    return { ...state, report: await detectPrerequisites(runner, logger) }
  },
}

const localServiceStep: PipelineStep = {
  name: "local-service",
  title: "Ensuring Ollama is running...",
  run: async (state, { runner, fetch, prompter, settings, logger }) => {
    const activation = await ensureLocalServiceRunning({
      baseUrl: LOCAL_INFERENCE_BASE_URL,
      timeoutMs: settings.probeTimeoutMs,
      runner,
      fetch,
      prompter,
      logger,
    })

    return {
      ...state,
      localServiceStatus: activation.status,
      warnings: [...state.warnings, ...activation.warnings],
    }
  },
}

const dependenciesStep: PipelineStep = {
  name: "dependencies",
  title: "Installing project dependencies...",
  run: async (state, { runner, logger }) => {
    const report = requireReport(state)

    await installProjectDependencies({
      projectDirectory: state.projectDirectory,
      pythonCommand: report.python.command ?? "python3",
      runner,
      logger,
    })

    return state
  },
}

const runtimeConfigStep: PipelineStep = {
  name: "runtime-config",
  title: "Creating development environment file...",
  run: async (state, { logger }) => {
    if (!state.credential) {
      throw new MissingCredentialError(CREDENTIAL_ENV_VAR)
    }

    const configPath = resolveRuntimeConfigPath(state.projectDirectory)
    await writeRuntimeConfig(configPath, buildRuntimeConfig({ credential: state.credential }))

    logger.info({ configPath }, "Environment file created")

    return { ...state, configPath }
  },
}

const modelsStep: PipelineStep = {
  name: "models",
  title: "Downloading development models...",
  run: async (state, { runner, logger }) => {
    const report = requireReport(state)
    const result = await prefetchModels({
      runtimeInstalled: report.ollama.present,
      runner,
      logger,
    })

    return {
      ...state,
      models: result.jobs,
      warnings: [...state.warnings, ...result.warnings],
    }
  },
}

const launchersStep: PipelineStep = {
  name: "launchers",
  title: "Creating startup scripts...",
  run: async (state, { settings, logger }) => {
    const launchers = await writeLauncherScripts(
      state.projectDirectory,
      renderLauncherScripts(settings.startupDelayMs)
    )

    logger.info({ launchers }, "Startup scripts written")

    return { ...state, launchers }
  },
}

const connectivityStep: PipelineStep = {
  name: "connectivity",
  title: "Testing connections...",
  run: async (state, { fetch, settings, logger }) => {
    const result = await verifyConnectivity({
      localBaseUrl: LOCAL_INFERENCE_BASE_URL,
      remoteBaseUrl: REMOTE_API_BASE_URL,
      credential: state.credential?.key ?? null,
      timeoutMs: settings.probeTimeoutMs,
      fetch,
      logger,
    })

    return {
      ...state,
      endpoints: result.endpoints,
      warnings: [...state.warnings, ...result.warnings],
    }
  },
}

export const PROVISIONING_STEPS: readonly PipelineStep[] = [
  detectStep,
  credentialStep,
  localRuntimeStep,
  localServiceStep,
  dependenciesStep,
  runtimeConfigStep,
  modelsStep,
  launchersStep,
  connectivityStep,
]

/**
 * Runs each step to completion before the next one starts. The state returned by one step
 * is the input of the next; fatal errors propagate out of the loop unchanged.
 */
export const runProvisioningPipeline = async (
  initialState: PipelineState,
  context: PipelineContext,
  steps: readonly PipelineStep[] = PROVISIONING_STEPS
): Promise<PipelineState> => {
  let state = initialState

  for (const step of steps) {
    const stepLogger = context.logger.child({ step: step.name })

    stepLogger.info(step.title)
    state = await step.run(state, { ...context, logger: stepLogger })
  }

  return state
}
