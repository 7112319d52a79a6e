import { describe, expect, it } from "vitest"

import {
  createProcessGroup,
  spawnDetachedJob,
  type SupervisedJob,
} from "../../src/supervisor/process-group.js"
import { createSilentLogger } from "../support/fakes.js"

const stubJob = (name: string, exitCode: number | null, terminate: SupervisedJob["terminate"]) => {
  return { name, pid: null, exited: Promise.resolve(exitCode), terminate }
}

describe("createProcessGroup", () => {
  it("waits for every member and reports exit codes in start order", async () => {
    // Arrange
    const group = createProcessGroup(createSilentLogger())
    group.add(stubJob("backend", 0, () => undefined))
    group.add(stubJob("frontend", null, () => undefined))

    // Act
    const codes = await group.waitForAll()

    // Assert
    expect(codes).toEqual([0, null])
    expect(group.members().map((job) => job.name)).toEqual(["backend", "frontend"])
  })

  it("keeps signalling the remaining members when one terminate throws", () => {
    // Arrange
    const group = createProcessGroup(createSilentLogger())
    const received: string[] = []
    group.add(
      stubJob("backend", 0, () => {
        throw new Error("kill ESRCH")
      })
    )
    group.add(stubJob("frontend", 0, (signal) => received.push(`frontend:${signal}`)))

    // Act
    const signalled = group.terminateAll("SIGTERM")

    // Assert
    expect(signalled).toEqual(["backend", "frontend"])
    expect(received).toEqual(["frontend:SIGTERM"])
  })
})

describe("spawnDetachedJob", () => {
  it("resolves the exit code of the job", async () => {
    // Arrange
    const spec = {
      name: "exit-three",
      command: process.execPath,
      args: ["-e", "process.exit(3)"],
      cwd: process.cwd(),
    }

    // Act
    const job = spawnDetachedJob(spec, createSilentLogger())

    // Assert
    expect(job.name).toBe("exit-three")
    await expect(job.exited).resolves.toBe(3)
  })

  it("resolves null when the launcher cannot be started", async () => {
    // Arrange
    const spec = {
      name: "missing",
      command: "devstack-test-missing-launcher",
      args: [],
      cwd: process.cwd(),
    }

    // Act
    const job = spawnDetachedJob(spec, createSilentLogger())

    // Assert
    await expect(job.exited).resolves.toBeNull()
  })

  it("ends a running job and its group on terminate", async () => {
    // Arrange
    const job = spawnDetachedJob(
      {
        name: "sleeper",
        command: process.execPath,
        args: ["-e", "setTimeout(() => undefined, 60_000)"],
        cwd: process.cwd(),
      },
      createSilentLogger()
    )

    // Act
    job.terminate("SIGTERM")

    // Assert
    await expect(job.exited).resolves.toBeNull()
  })
})
