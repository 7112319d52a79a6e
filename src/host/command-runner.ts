import { spawn } from "node:child_process"

export type CommandResult = {
  exitCode: number
  stdout: string
  stderr: string
}

export type RunCommandOptions = {
  cwd?: string
  /** Written to the child's stdin, which is then closed. */
  input?: string
  /** Stream child output to the terminal instead of capturing it. */
  inheritOutput?: boolean
}

export type CommandRunner = {
  run: (command: string, args: string[], options?: RunCommandOptions) => Promise<CommandResult>
}

export const COMMAND_NOT_FOUND_EXIT_CODE = 127

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException => {
  return error instanceof Error && "code" in error
}

/**
 * Runs host commands to completion. A missing executable resolves with exit code 127 (the
 * shell convention) so probing callers can treat it like any other failed invocation.
 */
export const createCommandRunner = (): CommandRunner => {
  return {
    run: async (command, args, options = {}) => {
      const passiveStdin = options.inheritOutput ? "inherit" : "ignore"
      const stdinMode = options.input == null ? passiveStdin : "pipe"
      const outputMode = options.inheritOutput ? "inherit" : "pipe"

      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: [stdinMode, outputMode, outputMode],
      })

      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []

      child.stdout?.on("data", (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })

      child.stderr?.on("data", (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      if (options.input != null && child.stdin) {
        child.stdin.end(options.input)
      }

      return await new Promise<CommandResult>((resolve, reject) => {
        child.on("error", (error) => {
          if (isErrnoException(error) && error.code === "ENOENT") {
            resolve({
              exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
              stdout: "",
              stderr: `${command}: command not found`,
            })
            return
          }

          reject(error)
        })

        child.on("close", (code) => {
          resolve({
            exitCode: code ?? 1,
            stdout: Buffer.concat(stdoutChunks).toString("utf8"),
            stderr: Buffer.concat(stderrChunks).toString("utf8"),
          })
        })
      })
    },
  }
}
