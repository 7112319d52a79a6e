import { access } from "node:fs/promises"
import { constants } from "node:fs"
import path from "node:path"

import type { Logger } from "pino"

import { BACKEND_DIRECTORY, VIRTUAL_ENV_DIRECTORY } from "../config/defaults.js"
import { DependencyInstallError } from "../errors.js"
import type { CommandRunner } from "../host/command-runner.js"

type InstallDependenciesInput = {
  projectDirectory: string
  pythonCommand: string
  runner: CommandRunner
  logger: Logger
}

export type DependencyInstallResult = {
  createdVirtualEnv: boolean
  virtualEnvPath: string
}

const pathExists = async (target: string): Promise<boolean> => {
  try {
    await access(target, constants.F_OK)
    return true
  } catch (error) {
    const err = error as NodeJS.ErrnoException

    if (err.code === "ENOENT") {
      return false
    }

    throw error
  }
}

const runStep = async (
  runner: CommandRunner,
  step: string,
  command: string,
  args: string[],
  cwd: string
): Promise<void> => {
  const result = await runner.run(command, args, { cwd, inheritOutput: true })

  if (result.exitCode !== 0) {
    throw new DependencyInstallError(step, result.exitCode)
  }
}

/**
 * Installs front-end packages at the project root and backend packages into an isolated
 * virtual environment, creating it only when absent.
 */
export const installProjectDependencies = async ({
  projectDirectory,
  pythonCommand,
  runner,
  logger,
}: InstallDependenciesInput): Promise<DependencyInstallResult> => {
  logger.info("Installing Node.js dependencies...")
  await runStep(runner, "npm install", "npm", ["install"], projectDirectory)

  const backendDirectory = path.join(projectDirectory, BACKEND_DIRECTORY)
  const virtualEnvPath = path.join(backendDirectory, VIRTUAL_ENV_DIRECTORY)
  const createdVirtualEnv = !(await pathExists(virtualEnvPath))

  if (createdVirtualEnv) {
    logger.info({ virtualEnvPath }, "Creating Python virtual environment...")
    await runStep(
      runner,
      "python venv",
      pythonCommand,
      ["-m", "venv", VIRTUAL_ENV_DIRECTORY],
      backendDirectory
    )
  }

  logger.info("Installing Python dependencies...")
  await runStep(
    runner,
    "pip install",
    path.join(virtualEnvPath, "bin", "pip"),
    ["install", "-r", "requirements.txt"],
    backendDirectory
  )

  return { createdVirtualEnv, virtualEnvPath }
}
