import { spawn } from "node:child_process"

import type { Logger } from "pino"

export type JobSpec = {
  name: string
  command: string
  args: string[]
  cwd: string
}

/**
 * Opaque handle to one background job. `exited` resolves with the exit code, or `null`
 * when the job was ended by a signal or never started.
 */
export type SupervisedJob = {
  name: string
  pid: number | null
  exited: Promise<number | null>
  terminate: (signal: NodeJS.Signals) => void
}

export type JobSpawner = (spec: JobSpec, logger: Logger) => SupervisedJob

/**
 * Starts a job in its own process group so a terminate reaches the launcher script and
 * everything it started (npm, the dev server, the backend workers).
 */
export const spawnDetachedJob: JobSpawner = (spec, logger) => {
  const child = spawn(spec.command, spec.args, {
    cwd: spec.cwd,
    detached: true,
    stdio: ["ignore", "inherit", "inherit"],
  })

  const exited = new Promise<number | null>((resolve) => {
    child.on("error", (error) => {
      logger.error({ job: spec.name, error: error.message }, "Job failed to start")
      resolve(null)
    })

    child.on("exit", (code) => {
      resolve(code)
    })
  })

  return {
    name: spec.name,
    pid: child.pid ?? null,
    exited,
    terminate: (signal) => {
      if (child.pid == null || child.exitCode != null || child.signalCode != null) {
        return
      }

      try {
        process.kill(-child.pid, signal)
      } catch (error) {
        logger.debug(
          { job: spec.name, error: error instanceof Error ? error.message : String(error) },
          "Process group signal failed, signalling job directly"
        )
        child.kill(signal)
      }

      // The supervisor exits without reaping; do not let the handle hold the event loop.
      child.unref()
    },
  }
}

export type ProcessGroup = {
  add: (job: SupervisedJob) => void
  members: () => SupervisedJob[]
  waitForAll: () => Promise<(number | null)[]>
  terminateAll: (signal: NodeJS.Signals) => string[]
}

/**
 * Tracks the supervisor's jobs in start order. Terminating signals every member even when
 * one of them throws.
 *
 * @param logger Supervisor logger for job lifecycle entries.
 * @returns Group owned by a single supervisor run.
 */
export const createProcessGroup = (logger: Logger): ProcessGroup => {
  const jobs: SupervisedJob[] = []

  return {
    add: (job) => {
      jobs.push(job)
      logger.info({ job: job.name, pid: job.pid }, "Job started")
    },
    members: () => [...jobs],
    waitForAll: async () => await Promise.all(jobs.map(async (job) => await job.exited)),
    terminateAll: (signal) => {
      for (const job of jobs) {
        try {
          job.terminate(signal)
        } catch (error) {
          logger.warn(
            { job: job.name, error: error instanceof Error ? error.message : String(error) },
            "Failed to signal job"
          )
        }
      }

      return jobs.map((job) => job.name)
    },
  }
}
