import type { Logger } from "pino"

import { LocalRuntimeInstallError, UnsupportedPlatformError } from "../errors.js"
import type { CommandRunner } from "../host/command-runner.js"
import type { FetchLike } from "../host/http-probe.js"
import type { HostPlatform } from "../host/platform.js"

export const OLLAMA_INSTALL_SCRIPT_URL = "https://ollama.ai/install.sh"
const INSTALL_SCRIPT_DOWNLOAD_TIMEOUT_MS = 60_000

export type InstallStrategyKind = "automated" | "manual-instructions" | "unsupported"

export type InstallContext = {
  runner: CommandRunner
  fetch: FetchLike
  logger: Logger
}

export type InstallStrategy = {
  kind: InstallStrategyKind
  install: (context: InstallContext) => Promise<void>
}

const downloadInstallScript = async (fetchImpl: FetchLike): Promise<string> => {
  let response: Response

  try {
    response = await fetchImpl(OLLAMA_INSTALL_SCRIPT_URL, {
      signal: AbortSignal.timeout(INSTALL_SCRIPT_DOWNLOAD_TIMEOUT_MS),
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new LocalRuntimeInstallError(`Failed to download Ollama install script: ${reason}`)
  }

  if (!response.ok) {
    throw new LocalRuntimeInstallError(
      `Failed to download Ollama install script (HTTP ${response.status})`
    )
  }

  return await response.text()
}

const automatedInstall: InstallStrategy = {
  kind: "automated",
  install: async ({ runner, fetch, logger }) => {
    logger.info({ url: OLLAMA_INSTALL_SCRIPT_URL }, "Installing Ollama for Linux...")

    const script = await downloadInstallScript(fetch)
    const result = await runner.run("sh", ["-s"], { input: script, inheritOutput: true })

    if (result.exitCode !== 0) {
      throw new LocalRuntimeInstallError(
        `Ollama install script exited with code ${result.exitCode}`
      )
    }

    logger.info("Ollama installed")
  },
}

const manualInstructions: InstallStrategy = {
  kind: "manual-instructions",
  install: async () => {
    throw new UnsupportedPlatformError("darwin", "Detected macOS. Please install Ollama manually", [
      "1. Visit https://ollama.ai/download",
      "2. Download and install Ollama for macOS",
      "3. Run this setup again",
    ])
  },
}

const unsupported: InstallStrategy = {
  kind: "unsupported",
  install: async () => {
    throw new UnsupportedPlatformError("other", "Unsupported OS", [
      "Please install Ollama manually from https://ollama.ai/",
    ])
  },
}

const STRATEGIES: Record<HostPlatform, InstallStrategy> = {
  linux: automatedInstall,
  darwin: manualInstructions,
  other: unsupported,
}

/**
 * @param platform Host platform from `resolveHostPlatform`.
 * @returns Strategy for that platform; every platform has one.
 */
export const selectInstallStrategy = (platform: HostPlatform): InstallStrategy => {
  return STRATEGIES[platform]
}

/**
 * Installs the local inference runtime for the host platform. Only called when detection
 * reported it absent; the caller re-detects afterwards.
 */
export const installLocalRuntime = async (
  platform: HostPlatform,
  context: InstallContext
): Promise<InstallStrategyKind> => {
  const strategy = selectInstallStrategy(platform)

  context.logger.debug({ platform, strategy: strategy.kind }, "Selected install strategy")
  await strategy.install(context)

  return strategy.kind
}
