import type { Logger } from "pino"

import type { CommandOptions } from "../cli/command.js"
import {
  CREDENTIAL_ENV_VAR,
  LOCAL_INFERENCE_BASE_URL,
  REMOTE_API_BASE_URL,
} from "../config/defaults.js"
import { resolveDevstackSettings } from "../config/devstack-settings.js"
import type { FetchLike } from "../host/http-probe.js"
import { verifyConnectivity, type ConnectivityReport } from "../provisioning/connectivity.js"
import { resolveRuntimeConfigPath } from "../provisioning/pipeline.js"
import { readRuntimeConfig } from "../provisioning/runtime-config.js"

export type CheckDependencies = {
  fetch: FetchLike
  environment: NodeJS.ProcessEnv
  cwd: string
}

const createDefaultCheckDependencies = (): CheckDependencies => {
  return {
    fetch: globalThis.fetch,
    environment: process.env,
    cwd: process.cwd(),
  }
}

const resolveCheckCredential = async (
  environment: NodeJS.ProcessEnv,
  configPath: string
): Promise<string | null> => {
  const fromEnvironment = environment[CREDENTIAL_ENV_VAR]?.trim()

  if (fromEnvironment) {
    return fromEnvironment
  }

  const stored = await readRuntimeConfig(configPath)

  return stored?.[CREDENTIAL_ENV_VAR]?.trim() || null
}

/**
 * Re-runs the reachability probes outside of setup. Never fails on unreachable endpoints.
 */
export const runCheck = async (
  logger: Logger,
  options: CommandOptions = {},
  dependencies: CheckDependencies = createDefaultCheckDependencies()
): Promise<ConnectivityReport> => {
  const settings = resolveDevstackSettings(
    dependencies.environment,
    { projectDirectory: options.projectDirectory },
    dependencies.cwd
  )
  const configPath = resolveRuntimeConfigPath(settings.projectDirectory)
  const credential = await resolveCheckCredential(dependencies.environment, configPath)

  if (!credential) {
    logger.warn({ configPath }, "No OpenAI API key found, probing without credentials")
  }

  const report = await verifyConnectivity({
    localBaseUrl: LOCAL_INFERENCE_BASE_URL,
    remoteBaseUrl: REMOTE_API_BASE_URL,
    credential,
    timeoutMs: settings.probeTimeoutMs,
    fetch: dependencies.fetch,
    logger,
  })

  logger.info(
    {
      command: "check",
      endpoints: report.endpoints.map((endpoint) => ({
        kind: endpoint.kind,
        reachable: endpoint.reachable,
      })),
    },
    "Connectivity check completed"
  )

  return report
}
