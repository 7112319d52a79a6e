export type DevstackErrorCode =
  | "missing_mandatory_tool"
  | "unsupported_platform"
  | "missing_credential"
  | "invalid_credential"
  | "dependency_install_failed"
  | "local_runtime_install_failed"
  | "runtime_config_invariant"
  | "launcher_missing"
  | "setup_cancelled"
  | "invalid_settings"

/**
 * Base class for conditions that halt the current command. The entry point logs `code`
 * and `hint` and exits non-zero.
 */
export class DevstackError extends Error {
  readonly code: DevstackErrorCode
  readonly hint: string | null

  constructor(code: DevstackErrorCode, message: string, hint: string | null = null) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.hint = hint
  }
}

export class MissingMandatoryToolError extends DevstackError {
  readonly tool: string

  constructor(tool: string, label: string, installHint: string) {
    super("missing_mandatory_tool", `${label} not found`, installHint)
    this.tool = tool
  }
}

export class UnsupportedPlatformError extends DevstackError {
  readonly platform: string

  constructor(platform: string, message: string, instructions: string[]) {
    super("unsupported_platform", message, instructions.join("\n"))
    this.platform = platform
  }
}

export class MissingCredentialError extends DevstackError {
  constructor(variableName: string) {
    super(
      "missing_credential",
      "OpenAI API Key is required",
      `Export ${variableName} or enter the key when prompted. ` +
        "Get one from https://platform.openai.com/api-keys"
    )
  }
}

/**
 * The key holds a character the environment file cannot carry inside single quotes.
 */
export class InvalidCredentialError extends DevstackError {
  constructor(variableName: string) {
    super(
      "invalid_credential",
      "OpenAI API Key contains a single quote or a line break",
      `Check the value of ${variableName} or the key entered at the prompt`
    )
  }
}

export class DependencyInstallError extends DevstackError {
  readonly step: string

  constructor(step: string, exitCode: number) {
    super("dependency_install_failed", `${step} failed with exit code ${exitCode}`)
    this.step = step
  }
}

export class LocalRuntimeInstallError extends DevstackError {
  constructor(message: string) {
    super(
      "local_runtime_install_failed",
      message,
      "Install Ollama manually from https://ollama.ai/ and run setup again"
    )
  }
}

export class RuntimeConfigInvariantError extends DevstackError {
  readonly violations: string[]

  constructor(violations: string[]) {
    super("runtime_config_invariant", `Invalid runtime config: ${violations.join("; ")}`)
    this.violations = violations
  }
}

export class LauncherMissingError extends DevstackError {
  readonly launcherPath: string

  constructor(launcherPath: string) {
    super(
      "launcher_missing",
      `Launcher script not found at ${launcherPath}`,
      'Run "devstack setup" first'
    )
    this.launcherPath = launcherPath
  }
}

export class SetupCancelledError extends DevstackError {
  constructor() {
    super("setup_cancelled", "Setup cancelled by operator")
  }
}

export class DevstackConfigError extends DevstackError {
  constructor(detail: string) {
    super("invalid_settings", `Invalid devstack settings: ${detail}`)
  }
}
