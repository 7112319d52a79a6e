import { describe, expect, it } from "vitest"

import { parseCommand } from "../../src/cli/command.js"

describe("parseCommand", () => {
  it("defaults to setup when no command is provided", () => {
    expect(parseCommand([])).toEqual({ command: "setup", options: { projectDirectory: undefined } })
  })

  it("returns start when start is provided", () => {
    expect(parseCommand(["start"]).command).toBe("start")
  })

  it("returns check when check is provided", () => {
    expect(parseCommand(["check"]).command).toBe("check")
  })

  it("reads the project directory option", () => {
    expect(parseCommand(["check", "--project-dir", "/srv/webui"])).toEqual({
      command: "check",
      options: { projectDirectory: "/srv/webui" },
    })
  })

  it("throws for unknown commands", () => {
    expect(() => parseCommand(["deploy"])).toThrow("Unknown command")
  })

  it("throws for unknown options", () => {
    expect(() => parseCommand(["setup", "--force"])).toThrow("unknown option")
  })
})
