import { BACKEND_URL, FRONTEND_URL } from "../config/defaults.js"
import type { CommandRunner } from "../host/command-runner.js"
import { LAUNCHER_FILES } from "./launchers.js"
import type { PipelineState } from "./types.js"

/**
 * @returns Output of `ollama list`, or `null` when the runtime is missing or the call fails.
 */
export const listLocalModels = async (
  runner: CommandRunner,
  runtimeInstalled: boolean
): Promise<string | null> => {
  if (!runtimeInstalled) {
    return null
  }

  const result = await runner.run("ollama", ["list"])

  return result.exitCode === 0 ? result.stdout.trimEnd() : null
}

/**
 * Builds the hand-off printed after setup: how to start the servers, where to open them,
 * the models available locally, and any collected warnings.
 *
 * @param state Final pipeline state.
 * @param localModels Output of `listLocalModels`; `null` prints a hint instead.
 * @returns Lines to print in order.
 */
export const buildSetupSummary = (state: PipelineState, localModels: string | null): string[] => {
  const lines = [
    "Setup complete! Your development environment is ready.",
    "",
    "Next steps:",
    "1. Start development servers:",
    `   ./${LAUNCHER_FILES.combined}   (or: devstack start)`,
    "",
    "2. Or start them separately:",
    `   Terminal 1: ./${LAUNCHER_FILES.backend}`,
    `   Terminal 2: ./${LAUNCHER_FILES.frontend}`,
    "",
    "3. Open your browser:",
    `   Frontend: ${FRONTEND_URL}`,
    `   Backend API: ${BACKEND_URL}`,
    "",
    "4. Create an account (first user becomes admin)",
    "5. Check Admin Panel -> Settings -> Connections",
    "",
    "Available Ollama models:",
    localModels ?? "  Run 'ollama list' to see models",
  ]

  if (state.warnings.length > 0) {
    lines.push("", "Warnings:", ...state.warnings.map((warning) => `  - ${warning.message}`))
  }

  return lines
}
