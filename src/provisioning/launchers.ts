import { chmod, writeFile } from "node:fs/promises"
import path from "node:path"

import {
  BACKEND_DIRECTORY,
  BACKEND_URL,
  FRONTEND_URL,
  RUNTIME_CONFIG_FILE,
  VIRTUAL_ENV_DIRECTORY,
} from "../config/defaults.js"

export type LauncherName = "backend" | "frontend" | "combined"

export type LauncherScript = {
  name: LauncherName
  fileName: string
  content: string
}

export const LAUNCHER_FILES: Record<LauncherName, string> = {
  backend: "start-backend-dev.sh",
  frontend: "start-frontend-dev.sh",
  combined: "start-dev-servers.sh",
}

const EXECUTABLE_MODE = 0o755

const renderBackendLauncher = (): string => {
  return [
    "#!/bin/bash",
    "set -e",
    `cd "$(dirname "$0")/${BACKEND_DIRECTORY}"`,
    `source ${VIRTUAL_ENV_DIRECTORY}/bin/activate`,
    "set -a",
    `. ./${RUNTIME_CONFIG_FILE}`,
    "set +a",
    "exec ./dev.sh",
    "",
  ].join("\n")
}

const renderFrontendLauncher = (): string => {
  return ["#!/bin/bash", 'cd "$(dirname "$0")"', "exec npm run dev", ""].join("\n")
}

const formatSeconds = (milliseconds: number): string => {
  return String(milliseconds / 1000)
}

const renderCombinedLauncher = (startupDelayMs: number): string => {
  return [
    "#!/bin/bash",
    'cd "$(dirname "$0")"',
    "",
    "cleanup() {",
    '  echo "Shutting down development servers..."',
    "  kill $(jobs -p) 2>/dev/null",
    "  exit 0",
    "}",
    "",
    "trap cleanup SIGINT",
    "",
    'echo "Starting development servers..."',
    `echo "Backend: ${BACKEND_URL}"`,
    `echo "Frontend: ${FRONTEND_URL}"`,
    'echo "Press Ctrl+C to stop both servers"',
    "",
    `./${LAUNCHER_FILES.backend} &`,
    `sleep ${formatSeconds(startupDelayMs)}`,
    `./${LAUNCHER_FILES.frontend} &`,
    "",
    "wait",
    "",
  ].join("\n")
}

/**
 * Same templates in, same bytes out: the only input is the startup delay.
 */
export const renderLauncherScripts = (startupDelayMs: number): LauncherScript[] => {
  return [
    { name: "backend", fileName: LAUNCHER_FILES.backend, content: renderBackendLauncher() },
    { name: "frontend", fileName: LAUNCHER_FILES.frontend, content: renderFrontendLauncher() },
    {
      name: "combined",
      fileName: LAUNCHER_FILES.combined,
      content: renderCombinedLauncher(startupDelayMs),
    },
  ]
}

/**
 * @returns Absolute path of the named launcher inside the project root.
 */
export const resolveLauncherPath = (projectDirectory: string, name: LauncherName): string => {
  return path.join(projectDirectory, LAUNCHER_FILES[name])
}

/**
 * Writes every launcher, overwriting existing files, and marks them executable.
 *
 * @returns Absolute paths of the written launchers.
 */
export const writeLauncherScripts = async (
  projectDirectory: string,
  scripts: LauncherScript[]
): Promise<string[]> => {
  const written: string[] = []

  for (const script of scripts) {
    const target = resolveLauncherPath(projectDirectory, script.name)

    await writeFile(target, script.content, { encoding: "utf8", mode: EXECUTABLE_MODE })
    // mode only applies when the file is created
    await chmod(target, EXECUTABLE_MODE)

    written.push(target)
  }

  return written
}
