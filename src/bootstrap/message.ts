/**
 * Keeps startup output in a single recognizable format so logs remain glanceable across
 * setup runs and supervised sessions.
 *
 * @param isoTimestamp ISO timestamp injected by the caller for deterministic log records.
 * @param version Build version of the running CLI.
 * @returns Canonical startup log line.
 */
export const buildBootstrapMessage = (isoTimestamp: string, version: string): string => {
  return `[devstack ${version}] bootstrap ready (${isoTimestamp})`
}
