import type { Logger } from "pino"

import { CREDENTIAL_ENV_VAR } from "../config/defaults.js"
import { InvalidCredentialError, MissingCredentialError } from "../errors.js"
import type { Prompter } from "../prompts/prompter.js"
import { isQuotableValue } from "./runtime-config.js"
import type { ProviderCredential } from "./types.js"

type AcquireCredentialInput = {
  environment: NodeJS.ProcessEnv
  prompter: Prompter | null
  logger: Logger
  variableName?: string
}

const accept = (
  key: string,
  source: ProviderCredential["source"],
  variableName: string
): ProviderCredential => {
  if (!isQuotableValue(key)) {
    throw new InvalidCredentialError(variableName)
  }

  return { key, source }
}

/**
 * Reads the remote API key from the environment, falling back to exactly one masked prompt.
 * Anything that leaves the key empty is fatal, and so is a key the environment file cannot
 * hold literally.
 *
 * @returns The trimmed key and where it came from.
 */
export const acquireCredential = async ({
  environment,
  prompter,
  logger,
  variableName = CREDENTIAL_ENV_VAR,
}: AcquireCredentialInput): Promise<ProviderCredential> => {
  const fromEnvironment = environment[variableName]?.trim()

  if (fromEnvironment) {
    logger.info({ variable: variableName }, "Using OpenAI API key from environment")
    return accept(fromEnvironment, "environment", variableName)
  }

  if (!prompter) {
    logger.error({ variable: variableName }, "No OpenAI API key and no interactive terminal")
    throw new MissingCredentialError(variableName)
  }

  logger.info("Get an OpenAI API key from: https://platform.openai.com/api-keys")
  const entered = (await prompter.readSecret("OpenAI API Key:"))?.trim()

  if (!entered) {
    throw new MissingCredentialError(variableName)
  }

  return accept(entered, "interactive", variableName)
}
