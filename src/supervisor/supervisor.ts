import type { Logger } from "pino"

import { createProcessGroup, type JobSpawner, type JobSpec } from "./process-group.js"

export type SupervisorPhase = "starting" | "running" | "terminating"

export type InterruptSource = (handler: (signal: NodeJS.Signals) => void) => () => void

export type SupervisorOutcome = {
  exitCode: 0
  reason: "interrupted" | "jobs-exited"
  signal: NodeJS.Signals | null
  started: string[]
  exitCodes: Record<string, number | null>
}

type RunSupervisorInput = {
  backend: JobSpec
  frontend: JobSpec
  startupDelayMs: number
  spawnJob: JobSpawner
  onInterrupt: InterruptSource
  logger: Logger
  onPhaseChange?: (phase: SupervisorPhase) => void
}

export const listenForInterrupts: InterruptSource = (handler) => {
  const onSignal = (signal: NodeJS.Signals): void => {
    handler(signal)
  }

  process.on("SIGINT", onSignal)
  process.on("SIGTERM", onSignal)

  return () => {
    process.off("SIGINT", onSignal)
    process.off("SIGTERM", onSignal)
  }
}

/**
 * Resolves `true` after the delay, or `false` as soon as the signal aborts.
 */
const delayUnlessAborted = async (milliseconds: number, signal: AbortSignal): Promise<boolean> => {
  if (signal.aborted) {
    return false
  }

  return await new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve(false)
    }

    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort)
      resolve(true)
    }, milliseconds)

    signal.addEventListener("abort", onAbort, { once: true })
  })
}

const whenAborted = async (signal: AbortSignal): Promise<void> => {
  if (signal.aborted) {
    return
  }

  await new Promise<void>((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true })
  })
}

/**
 * Runs the backend and front-end launchers as one group for a foreground session.
 *
 * The front-end starts a fixed delay after the backend; there is no readiness handshake.
 * An interrupt at any point sends SIGTERM to every started job and resolves with exit
 * code 0 without waiting for the jobs to finish. There is no restart policy.
 */
export const runSupervisor = async ({
  backend,
  frontend,
  startupDelayMs,
  spawnJob,
  onInterrupt,
  logger,
  onPhaseChange,
}: RunSupervisorInput): Promise<SupervisorOutcome> => {
  const cancellation = new AbortController()
  const group = createProcessGroup(logger)
  let receivedSignal: NodeJS.Signals | null = null

  const enterPhase = (phase: SupervisorPhase): void => {
    logger.debug({ phase }, "Supervisor phase changed")
    onPhaseChange?.(phase)
  }

  enterPhase("starting")

  const disposeInterruptHandler = onInterrupt((signal) => {
    if (cancellation.signal.aborted) {
      return
    }

    receivedSignal = signal
    cancellation.abort()
  })

  try {
    logger.info({ job: backend.name }, "Starting backend...")
    group.add(spawnJob(backend, logger))

    if (await delayUnlessAborted(startupDelayMs, cancellation.signal)) {
      logger.info({ job: frontend.name }, "Starting frontend...")
      group.add(spawnJob(frontend, logger))
      enterPhase("running")

      const finished = await Promise.race([
        group.waitForAll(),
        whenAborted(cancellation.signal).then(() => null),
      ])

      if (finished) {
        const exitCodes = Object.fromEntries(
          group.members().map((job, index) => [job.name, finished[index] ?? null])
        )

        logger.info({ exitCodes }, "All development servers exited")

        return {
          exitCode: 0,
          reason: "jobs-exited",
          signal: null,
          started: group.members().map((job) => job.name),
          exitCodes,
        }
      }
    }

    enterPhase("terminating")
    logger.info({ signal: receivedSignal }, "Shutting down development servers...")

    const started = group.terminateAll("SIGTERM")

    return {
      exitCode: 0,
      reason: "interrupted",
      signal: receivedSignal,
      started,
      exitCodes: {},
    }
  } finally {
    disposeInterruptHandler()
  }
}
