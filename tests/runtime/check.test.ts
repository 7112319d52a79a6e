import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"

import { afterEach, describe, expect, it } from "vitest"

import { resolveRuntimeConfigPath } from "../../src/provisioning/pipeline.js"
import { buildRuntimeConfig, writeRuntimeConfig } from "../../src/provisioning/runtime-config.js"
import { runCheck } from "../../src/runtime/check.js"
import { createFakeFetch, createSilentLogger } from "../support/fakes.js"

const TEMP_PREFIX = path.join(tmpdir(), "devstack-check-")
const cleanupPaths: string[] = []

afterEach(async () => {
  await Promise.all(
    cleanupPaths.splice(0).map(async (directory) => rm(directory, { recursive: true, force: true }))
  )
})

const createProject = async (): Promise<string> => {
  const projectDirectory = await mkdtemp(TEMP_PREFIX)
  cleanupPaths.push(projectDirectory)

  return projectDirectory
}

const authorizationOf = (init: RequestInit | undefined): string | null => {
  return new Headers(init?.headers).get("Authorization")
}

describe("runCheck", () => {
  it("reads the credential from the generated environment file", async () => {
    // Arrange
    const projectDirectory = await createProject()
    await writeRuntimeConfig(
      resolveRuntimeConfigPath(projectDirectory),
      buildRuntimeConfig({ credential: { key: "test-secret", source: "interactive" } })
    )
    const { fetch, requests } = createFakeFetch(() => new Response("{}", { status: 200 }))

    // Act
    const report = await runCheck(
      createSilentLogger(),
      { projectDirectory },
      { fetch, environment: {}, cwd: "/unused" }
    )

    // Assert
    expect(report.warnings).toEqual([])
    expect(requests.map((request) => request.url)).toEqual([
      "http://localhost:11434/api/tags",
      "https://api.openai.com/v1/models",
    ])
    expect(authorizationOf(requests[1]?.init)).toBe("Bearer test-secret")
  })

  it("prefers the exported credential over the stored one", async () => {
    // Arrange
    const projectDirectory = await createProject()
    await writeRuntimeConfig(
      resolveRuntimeConfigPath(projectDirectory),
      buildRuntimeConfig({ credential: { key: "stored-secret", source: "interactive" } })
    )
    const { fetch, requests } = createFakeFetch(() => new Response("{}", { status: 200 }))

    // Act
    await runCheck(
      createSilentLogger(),
      {},
      { fetch, environment: { OPENAI_API_KEY: "test-secret" }, cwd: projectDirectory }
    )

    // Assert
    expect(authorizationOf(requests[1]?.init)).toBe("Bearer test-secret")
  })

  it("reports unreachable endpoints as warnings without failing", async () => {
    // Arrange
    const projectDirectory = await createProject()
    const { fetch, requests } = createFakeFetch(() => new Error("connect ECONNREFUSED"))

    // Act
    const report = await runCheck(
      createSilentLogger(),
      { projectDirectory },
      { fetch, environment: {}, cwd: "/unused" }
    )

    // Assert
    expect(report.endpoints.map((endpoint) => endpoint.reachable)).toEqual([false, false])
    expect(report.warnings.map((warning) => warning.message)).toEqual([
      "Ollama connection failed: connect ECONNREFUSED",
      "OpenAI API connection failed: connect ECONNREFUSED",
    ])
    expect(authorizationOf(requests[1]?.init)).toBeNull()
  })
})
