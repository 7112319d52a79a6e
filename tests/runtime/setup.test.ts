import { mkdir, mkdtemp, readFile, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"

import { afterEach, describe, expect, it } from "vitest"

import { runSetup } from "../../src/runtime/setup.js"
import {
  createFakeFetch,
  createFakeRunner,
  createSilentLogger,
  INSTALLED_TOOLCHAIN,
} from "../support/fakes.js"

const TEMP_PREFIX = path.join(tmpdir(), "devstack-setup-")
const cleanupPaths: string[] = []

afterEach(async () => {
  await Promise.all(
    cleanupPaths.splice(0).map(async (directory) => rm(directory, { recursive: true, force: true }))
  )
})

describe("runSetup", () => {
  it("provisions the project named by --project-dir and prints the next steps", async () => {
    // Arrange
    const projectDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(projectDirectory)
    await mkdir(path.join(projectDirectory, "backend", "venv"), { recursive: true })
    const pip = path.join(projectDirectory, "backend", "venv", "bin", "pip")
    const { runner } = createFakeRunner({
      ...INSTALLED_TOOLCHAIN,
      "npm install": { exitCode: 0 },
      [`${pip} install -r requirements.txt`]: { exitCode: 0 },
      "ollama pull llama3.2:1b": { exitCode: 0 },
      "ollama pull phi3:mini": { exitCode: 0 },
      "ollama list": { stdout: "NAME           SIZE\nllama3.2:1b    1.3 GB\n" },
    })
    const { fetch } = createFakeFetch(() => new Response("{}", { status: 200 }))
    const output: string[] = []

    // Act
    const state = await runSetup(
      createSilentLogger(),
      { projectDirectory },
      {
        runner,
        fetch,
        prompter: null,
        environment: { OPENAI_API_KEY: "test-secret" },
        platform: "linux",
        cwd: "/unused",
        writeLine: (line) => output.push(line),
      }
    )

    // Assert
    expect(state.projectDirectory).toBe(projectDirectory)
    expect(output[0]).toBe("Setup complete! Your development environment is ready.")
    expect(output.slice(-2)).toEqual([
      "Available Ollama models:",
      "NAME           SIZE\nllama3.2:1b    1.3 GB",
    ])
    await expect(
      readFile(path.join(projectDirectory, "start-dev-servers.sh"), "utf8")
    ).resolves.toContain("sleep 3\n")
  })
})
