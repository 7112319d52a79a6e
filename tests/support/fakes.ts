import type { Logger } from "pino"

import type {
  CommandResult,
  CommandRunner,
  RunCommandOptions,
} from "../../src/host/command-runner.js"
import type { FetchLike } from "../../src/host/http-probe.js"
import { createLogger } from "../../src/logging/logger.js"
import type { Prompter } from "../../src/prompts/prompter.js"
import type {
  JobSpawner,
  JobSpec,
  SupervisedJob,
} from "../../src/supervisor/process-group.js"
import type { InterruptSource } from "../../src/supervisor/supervisor.js"

export const createSilentLogger = (): Logger => {
  return createLogger({ env: "test", logLevel: "silent" })
}

export type RecordedCommand = {
  line: string
  command: string
  args: string[]
  options: RunCommandOptions | undefined
}

type ScriptedResponse =
  | Partial<CommandResult>
  | Error
  | ((call: RecordedCommand) => Partial<CommandResult>)

/**
 * Scripted command runner keyed by the full command line (`"ollama pull phi3:mini"`).
 * Unscripted commands behave like missing executables.
 */
export const createFakeRunner = (responses: Record<string, ScriptedResponse> = {}) => {
  const calls: RecordedCommand[] = []

  const runner: CommandRunner = {
    run: async (command, args, options) => {
      const call = { line: [command, ...args].join(" "), command, args, options }
      calls.push(call)

      const response = responses[call.line]

      if (response instanceof Error) {
        throw response
      }

      const resolved = typeof response === "function" ? response(call) : response

      if (!resolved) {
        return { exitCode: 127, stdout: "", stderr: `${command}: command not found` }
      }

      return { exitCode: 0, stdout: "", stderr: "", ...resolved }
    },
  }

  return { runner, calls, lines: () => calls.map((call) => call.line) }
}

export type RecordedRequest = {
  url: string
  init: RequestInit | undefined
}

export const createFakeFetch = (
  handler: (url: string, init: RequestInit | undefined) => Response | Error
) => {
  const requests: RecordedRequest[] = []

  const fetch: FetchLike = async (url, init) => {
    requests.push({ url, init })
    const result = handler(url, init)

    if (result instanceof Error) {
      throw result
    }

    return result
  }

  return { fetch, requests }
}

export const createCannedPrompter = (secret: string | null = "") => {
  const prompts: string[] = []
  const confirmations: string[] = []

  const prompter: Prompter = {
    readSecret: async (message) => {
      prompts.push(message)
      return secret
    },
    confirm: async (message) => {
      confirmations.push(message)
    },
  }

  return { prompter, prompts, confirmations }
}

export const INSTALLED_TOOLCHAIN: Record<string, Partial<CommandResult>> = {
  "node --version": { stdout: "v20.11.1\n" },
  "npm --version": { stdout: "10.2.4\n" },
  "python3 --version": { stdout: "Python 3.11.8\n" },
  "ollama --version": { stdout: "ollama version is 0.3.12\n" },
}

export type FakeJob = SupervisedJob & {
  spec: JobSpec
  signals: NodeJS.Signals[]
  exit: (code: number | null) => void
}

/**
 * Job spawner whose jobs run until a test calls `exit`. Terminating a job records the
 * signal without ending it.
 */
export const createFakeJobSpawner = () => {
  const jobs: FakeJob[] = []

  const spawnJob: JobSpawner = (spec) => {
    let exit: (code: number | null) => void = () => undefined
    const exited = new Promise<number | null>((resolve) => {
      exit = resolve
    })
    const signals: NodeJS.Signals[] = []

    const job: FakeJob = {
      spec,
      name: spec.name,
      pid: 4000 + jobs.length,
      exited,
      signals,
      exit: (code) => exit(code),
      terminate: (signal) => {
        signals.push(signal)
      },
    }

    jobs.push(job)

    return job
  }

  return { spawnJob, jobs }
}

/**
 * Interrupt source that a test triggers by hand.
 */
export const createManualInterrupts = () => {
  let current: ((signal: NodeJS.Signals) => void) | null = null
  let disposed = 0

  const onInterrupt: InterruptSource = (handler) => {
    current = handler
    return () => {
      disposed += 1
      current = null
    }
  }

  return {
    onInterrupt,
    trigger: (signal: NodeJS.Signals = "SIGINT") => current?.(signal),
    disposedCount: () => disposed,
  }
}
