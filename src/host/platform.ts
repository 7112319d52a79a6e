export type HostPlatform = "linux" | "darwin" | "other"

/**
 * Narrows the Node.js platform to the hosts the installer distinguishes, so strategy lookup
 * stays total.
 *
 * @param value Platform reported by Node.js.
 * @returns `linux`, `darwin`, or `other` for everything else.
 */
export const resolveHostPlatform = (value: NodeJS.Platform = process.platform): HostPlatform => {
  if (value === "linux") {
    return "linux"
  }

  if (value === "darwin") {
    return "darwin"
  }

  return "other"
}
