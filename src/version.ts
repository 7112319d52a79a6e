/**
 * Build version reported in startup logs so support reports identify the exact release.
 */
export const APP_VERSION = "0.1.0"

export const getAppVersion = (): string => {
  return APP_VERSION
}
