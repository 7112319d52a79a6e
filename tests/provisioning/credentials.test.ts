import { describe, expect, it } from "vitest"

import { InvalidCredentialError, MissingCredentialError } from "../../src/errors.js"
import { acquireCredential } from "../../src/provisioning/credentials.js"
import { createCannedPrompter, createSilentLogger } from "../support/fakes.js"

describe("acquireCredential", () => {
  it("rejects an exported key the environment file cannot quote", async () => {
    // Arrange
    const { prompter, prompts } = createCannedPrompter("test-secret")

    // Act
    const acquisition = acquireCredential({
      environment: { OPENAI_API_KEY: "sk-it's" },
      prompter,
      logger: createSilentLogger(),
    })

    // Assert
    await expect(acquisition).rejects.toBeInstanceOf(InvalidCredentialError)
    await expect(acquisition).rejects.toMatchObject({ code: "invalid_credential" })
    expect(prompts).toEqual([])
  })

  it("rejects an entered key spanning several lines", async () => {
    // Arrange
    const { prompter } = createCannedPrompter("sk-first\nsk-second")

    // Act
    const acquisition = acquireCredential({
      environment: {},
      prompter,
      logger: createSilentLogger(),
    })

    // Assert
    await expect(acquisition).rejects.toBeInstanceOf(InvalidCredentialError)
  })

  it("uses the environment variable without prompting", async () => {
    // Arrange
    const { prompter, prompts } = createCannedPrompter("ignored")

    // Act
    const credential = await acquireCredential({
      environment: { OPENAI_API_KEY: " test-secret " },
      prompter,
      logger: createSilentLogger(),
    })

    // Assert
    expect(credential).toEqual({ key: "test-secret", source: "environment" })
    expect(prompts).toEqual([])
  })

  it("prompts exactly once when the variable is unset", async () => {
    // Arrange
    const { prompter, prompts } = createCannedPrompter("test-secret")

    // Act
    const credential = await acquireCredential({
      environment: {},
      prompter,
      logger: createSilentLogger(),
    })

    // Assert
    expect(credential).toEqual({ key: "test-secret", source: "interactive" })
    expect(prompts).toEqual(["OpenAI API Key:"])
  })

  it("fails when the prompt returns an empty line", async () => {
    // Arrange
    const { prompter, prompts } = createCannedPrompter("   ")

    // Act
    const acquisition = acquireCredential({
      environment: { OPENAI_API_KEY: "" },
      prompter,
      logger: createSilentLogger(),
    })

    // Assert
    await expect(acquisition).rejects.toBeInstanceOf(MissingCredentialError)
    expect(prompts).toHaveLength(1)
  })

  it("fails when the prompt is cancelled", async () => {
    // Arrange
    const { prompter } = createCannedPrompter(null)

    // Act
    const acquisition = acquireCredential({
      environment: {},
      prompter,
      logger: createSilentLogger(),
    })

    // Assert
    await expect(acquisition).rejects.toThrow("OpenAI API Key is required")
  })

  it("fails fast without a terminal to prompt on", async () => {
    // Act
    const acquisition = acquireCredential({
      environment: {},
      prompter: null,
      logger: createSilentLogger(),
    })

    // Assert
    await expect(acquisition).rejects.toMatchObject({ code: "missing_credential" })
  })
})
