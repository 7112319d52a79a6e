export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type ProbeResult = {
  url: string
  ok: boolean
  status: number | null
  error: string | null
}

type ProbeOptions = {
  timeoutMs: number
  headers?: Record<string, string>
}

/**
 * Issues one GET with a hard timeout. Any 2xx counts as reachable; the body is never read.
 */
export const probeEndpoint = async (
  fetchImpl: FetchLike,
  url: string,
  { timeoutMs, headers }: ProbeOptions
): Promise<ProbeResult> => {
  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    })

    await response.body?.cancel()

    return {
      url,
      ok: response.ok,
      status: response.status,
      error: response.ok ? null : `HTTP ${response.status}`,
    }
  } catch (error) {
    return {
      url,
      ok: false,
      status: null,
      error: error instanceof Error ? error.message : String(error),
    }
  }
}
