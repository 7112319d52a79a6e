import path from "node:path"

import { z } from "zod"

import { DevstackConfigError } from "../errors.js"
import { DEFAULT_PROBE_TIMEOUT_MS, DEFAULT_STARTUP_DELAY_MS } from "./defaults.js"

export type DevstackSettings = {
  projectDirectory: string
  probeTimeoutMs: number
  startupDelayMs: number
}

type SettingsOverrides = {
  projectDirectory?: string
}

// Largest delay setTimeout honours; larger values fire almost immediately.
const MAX_TIMER_DELAY_MS = 2_147_483_647

const devstackSettingsSchema = z.object({
  DEVSTACK_PROJECT_DIR: z.string().optional(),
  DEVSTACK_PROBE_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, "must be an integer")
    .transform(Number)
    .refine((value) => value >= 100, "must be >= 100")
    .refine((value) => value <= MAX_TIMER_DELAY_MS, `must be <= ${MAX_TIMER_DELAY_MS}`)
    .optional(),
  DEVSTACK_STARTUP_DELAY_MS: z
    .string()
    .regex(/^\d+$/, "must be an integer")
    .transform(Number)
    .refine((value) => value <= MAX_TIMER_DELAY_MS, `must be <= ${MAX_TIMER_DELAY_MS}`)
    .optional(),
})

/**
 * Resolves tunables from environment so timeouts and the launch delay can be adjusted on
 * slow machines without editing generated scripts.
 *
 * @param environment Environment source, defaulting to process.env.
 * @param overrides Values from CLI flags, which win over environment values.
 * @param cwd Working directory used when no project directory is configured.
 * @returns Normalized devstack settings.
 */
export const resolveDevstackSettings = (
  environment: NodeJS.ProcessEnv = process.env,
  overrides: SettingsOverrides = {},
  cwd = process.cwd()
): DevstackSettings => {
  const parsed = devstackSettingsSchema.safeParse(environment)

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")

    throw new DevstackConfigError(detail)
  }

  const configuredDirectory =
    overrides.projectDirectory?.trim() || parsed.data.DEVSTACK_PROJECT_DIR?.trim() || cwd

  return {
    projectDirectory: path.resolve(cwd, configuredDirectory),
    probeTimeoutMs: parsed.data.DEVSTACK_PROBE_TIMEOUT_MS ?? DEFAULT_PROBE_TIMEOUT_MS,
    startupDelayMs: parsed.data.DEVSTACK_STARTUP_DELAY_MS ?? DEFAULT_STARTUP_DELAY_MS,
  }
}
