import { constants } from "node:fs"
import { access } from "node:fs/promises"

import type { Logger } from "pino"

import type { CommandOptions } from "../cli/command.js"
import { BACKEND_URL, FRONTEND_URL } from "../config/defaults.js"
import { resolveDevstackSettings } from "../config/devstack-settings.js"
import { LauncherMissingError } from "../errors.js"
import { resolveLauncherPath, type LauncherName } from "../provisioning/launchers.js"
import { spawnDetachedJob, type JobSpawner, type JobSpec } from "../supervisor/process-group.js"
import {
  listenForInterrupts,
  runSupervisor,
  type InterruptSource,
  type SupervisorOutcome,
} from "../supervisor/supervisor.js"

export type StartDependencies = {
  spawnJob: JobSpawner
  onInterrupt: InterruptSource
  environment: NodeJS.ProcessEnv
  cwd: string
}

const createDefaultStartDependencies = (): StartDependencies => {
  return {
    spawnJob: spawnDetachedJob,
    onInterrupt: listenForInterrupts,
    environment: process.env,
    cwd: process.cwd(),
  }
}

const resolveLauncherJob = async (
  projectDirectory: string,
  name: LauncherName
): Promise<JobSpec> => {
  const launcherPath = resolveLauncherPath(projectDirectory, name)

  await access(launcherPath, constants.X_OK).catch(() => {
    throw new LauncherMissingError(launcherPath)
  })

  return { name, command: launcherPath, args: [], cwd: projectDirectory }
}

/**
 * Starts backend and front-end as one supervised group and blocks until an interrupt or
 * until both exit.
 */
export const runStart = async (
  logger: Logger,
  options: CommandOptions = {},
  dependencies: StartDependencies = createDefaultStartDependencies()
): Promise<SupervisorOutcome> => {
  const settings = resolveDevstackSettings(
    dependencies.environment,
    { projectDirectory: options.projectDirectory },
    dependencies.cwd
  )

  const backend = await resolveLauncherJob(settings.projectDirectory, "backend")
  const frontend = await resolveLauncherJob(settings.projectDirectory, "frontend")

  logger.info(
    { backend: BACKEND_URL, frontend: FRONTEND_URL },
    "Starting development servers, press Ctrl+C to stop both"
  )

  const outcome = await runSupervisor({
    backend,
    frontend,
    startupDelayMs: settings.startupDelayMs,
    spawnJob: dependencies.spawnJob,
    onInterrupt: dependencies.onInterrupt,
    logger,
  })

  logger.info({ command: "start", reason: outcome.reason }, "Development servers stopped")

  return outcome
}
