import type { Logger } from "pino"

import type { CommandRunner } from "../host/command-runner.js"
import type { ModelDownloadJob, PipelineWarning } from "./types.js"

export const DEVELOPMENT_MODELS = ["llama3.2:1b", "phi3:mini"] as const

type PrefetchModelsInput = {
  runtimeInstalled: boolean
  runner: CommandRunner
  logger: Logger
  models?: readonly string[]
}

export type PrefetchResult = {
  jobs: ModelDownloadJob[]
  warnings: PipelineWarning[]
}

const pullModel = async (runner: CommandRunner, name: string): Promise<string | null> => {
  try {
    const result = await runner.run("ollama", ["pull", name], { inheritOutput: true })
    return result.exitCode === 0 ? null : `exit code ${result.exitCode}`
  } catch (error) {
    return error instanceof Error ? error.message : String(error)
  }
}

/**
 * Pulls each development model in order. A failed pull is a warning and never stops the
 * remaining pulls.
 */
export const prefetchModels = async ({
  runtimeInstalled,
  runner,
  logger,
  models = DEVELOPMENT_MODELS,
}: PrefetchModelsInput): Promise<PrefetchResult> => {
  const jobs: ModelDownloadJob[] = models.map((name) => ({ name, status: "pending" }))
  const warnings: PipelineWarning[] = []

  if (!runtimeInstalled) {
    logger.warn("Ollama is not installed, skipping model downloads")
    return { jobs, warnings }
  }

  for (const job of jobs) {
    logger.info({ model: job.name }, `Downloading ${job.name}...`)

    const failure = await pullModel(runner, job.name)

    if (failure == null) {
      job.status = "succeeded"
      logger.info({ model: job.name }, `Downloaded ${job.name}`)
      continue
    }

    job.status = "failed"
    warnings.push({ kind: "model-pull", message: `Failed to download ${job.name}: ${failure}` })
    logger.warn(
      { model: job.name, reason: failure },
      `Failed to download ${job.name} (you can download it later)`
    )
  }

  return { jobs, warnings }
}
