import type { Logger } from "pino"

import { probeEndpoint, type FetchLike, type ProbeResult } from "../host/http-probe.js"
import type { PipelineWarning, ServiceEndpoint } from "./types.js"

type VerifyConnectivityInput = {
  localBaseUrl: string
  remoteBaseUrl: string
  credential: string | null
  timeoutMs: number
  fetch: FetchLike
  logger: Logger
}

export type ConnectivityReport = {
  endpoints: ServiceEndpoint[]
  warnings: PipelineWarning[]
}

export const localStatusUrl = (baseUrl: string): string => `${baseUrl}/api/tags`

const remoteModelsUrl = (baseUrl: string): string => `${baseUrl}/models`

const describeFailure = (probe: ProbeResult): string => {
  return probe.error ?? "unreachable"
}

/**
 * Probes both providers once. Purely diagnostic: failures become warnings, never errors.
 */
export const verifyConnectivity = async ({
  localBaseUrl,
  remoteBaseUrl,
  credential,
  timeoutMs,
  fetch,
  logger,
}: VerifyConnectivityInput): Promise<ConnectivityReport> => {
  const warnings: PipelineWarning[] = []

  const local = await probeEndpoint(fetch, localStatusUrl(localBaseUrl), { timeoutMs })

  if (local.ok) {
    logger.info({ url: local.url }, "Ollama connection successful")
  } else {
    logger.warn({ url: local.url, error: local.error }, "Ollama connection failed")
    warnings.push({
      kind: "reachability",
      message: `Ollama connection failed: ${describeFailure(local)}`,
    })
  }

  const remote = await probeEndpoint(fetch, remoteModelsUrl(remoteBaseUrl), {
    timeoutMs,
    headers: credential ? { Authorization: `Bearer ${credential}` } : undefined,
  })

  if (remote.ok) {
    logger.info({ url: remote.url }, "OpenAI API connection successful")
  } else {
    logger.warn(
      { url: remote.url, error: remote.error },
      "OpenAI API connection failed (check your API key)"
    )
    warnings.push({
      kind: "reachability",
      message: `OpenAI API connection failed: ${describeFailure(remote)}`,
    })
  }

  return {
    endpoints: [
      { url: localBaseUrl, kind: "local-inference", reachable: local.ok },
      { url: remoteBaseUrl, kind: "remote-api", reachable: remote.ok },
    ],
    warnings,
  }
}
