import type { HostPlatform } from "../host/platform.js"

export type ToolName = "node" | "npm" | "python" | "ollama"

export type ToolStatus = {
  present: boolean
  version?: string
  /** Executable that answered, e.g. `python3` when both interpreters are candidates. */
  command?: string
}

export type PrerequisiteReport = Readonly<Record<ToolName, Readonly<ToolStatus>>>

export type CredentialSource = "environment" | "interactive"

export type ProviderCredential = {
  key: string
  source: CredentialSource
}

export type EndpointKind = "local-inference" | "remote-api"

export type ServiceEndpoint = {
  url: string
  kind: EndpointKind
  reachable?: boolean
}

export type ModelDownloadStatus = "pending" | "succeeded" | "failed"

export type ModelDownloadJob = {
  name: string
  status: ModelDownloadStatus
}

export type LocalServiceStatus = "already-running" | "service-manager-started" | "manual-confirmed"

export type PipelineWarningKind = "service-start" | "model-pull" | "reachability"

export type PipelineWarning = {
  kind: PipelineWarningKind
  message: string
}

export type PipelineState = {
  projectDirectory: string
  platform: HostPlatform
  report: PrerequisiteReport | null
  credential: ProviderCredential | null
  localServiceStatus: LocalServiceStatus | null
  configPath: string | null
  models: ModelDownloadJob[]
  launchers: string[]
  endpoints: ServiceEndpoint[]
  warnings: PipelineWarning[]
}
