import { isCancel, password, text } from "@clack/prompts"

import { SetupCancelledError } from "../errors.js"

/**
 * Interactive capabilities the pipeline needs from an operator. Non-interactive sessions
 * pass `null` instead of a prompter.
 */
export type Prompter = {
  /** Masked single-line input. Resolves `null` when the operator cancels. */
  readSecret: (message: string) => Promise<string | null>
  /** Blocks until the operator submits a line; the content is discarded. */
  confirm: (message: string) => Promise<void>
}

/**
 * Builds the terminal prompter. Cancelling the secret prompt reads as "no key", which the
 * caller treats as fatal; cancelling a confirmation aborts setup.
 *
 * @returns Prompter backed by @clack/prompts.
 */
export const createClackPrompter = (): Prompter => {
  return {
    readSecret: async (message) => {
      const value = await password({ message, mask: "*" })

      if (isCancel(value)) {
        return null
      }

      return typeof value === "string" ? value : ""
    },
    confirm: async (message) => {
      const value = await text({ message, placeholder: "Press Enter to continue" })

      if (isCancel(value)) {
        throw new SetupCancelledError()
      }
    },
  }
}

/**
 * Only interactive terminals get a prompter, so piped or CI runs never block on input.
 *
 * @param stdin Stream whose `isTTY` decides interactivity.
 * @param factory Builds the prompter for interactive sessions.
 * @returns A prompter, or `null` for non-interactive sessions.
 */
export const resolvePrompter = (
  stdin: { isTTY?: boolean } = process.stdin,
  factory: () => Prompter = createClackPrompter
): Prompter | null => {
  return stdin.isTTY ? factory() : null
}
