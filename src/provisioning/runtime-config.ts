import { mkdir, readFile, writeFile } from "node:fs/promises"
import path from "node:path"

import { parse } from "dotenv"

import {
  BACKEND_PORT,
  FRONTEND_URL,
  LOCAL_INFERENCE_BASE_URL,
  REMOTE_API_BASE_URL,
} from "../config/defaults.js"
import { RuntimeConfigInvariantError } from "../errors.js"
import type { ProviderCredential } from "./types.js"

export type RuntimeConfigKey =
  | "OPENAI_API_KEY"
  | "OPENAI_API_BASE_URL"
  | "ENABLE_OPENAI_API"
  | "OLLAMA_BASE_URL"
  | "ENABLE_OLLAMA_API"
  | "CORS_ALLOW_ORIGIN"
  | "ENV"
  | "PORT"
  | "ENABLE_DIRECT_CONNECTIONS"

export type RuntimeConfigEntry = {
  key: RuntimeConfigKey
  value: string
}

export type RuntimeConfigSection = {
  title: string
  entries: RuntimeConfigEntry[]
}

export type RuntimeConfig = {
  sections: RuntimeConfigSection[]
  /** Inactive multi-provider examples, rendered as comments. */
  templates: string[]
}

type BuildRuntimeConfigInput = {
  credential: ProviderCredential
}

const ENABLED = "True"

/**
 * Keys each enablement flag depends on. A flag set to True with any of these missing or
 * empty is rejected before the artifact is written.
 */
const ENABLEMENT_DEPENDENCIES: readonly {
  flag: RuntimeConfigKey
  requires: RuntimeConfigKey[]
}[] = [
  { flag: "ENABLE_OPENAI_API", requires: ["OPENAI_API_KEY", "OPENAI_API_BASE_URL"] },
  { flag: "ENABLE_OLLAMA_API", requires: ["OLLAMA_BASE_URL"] },
]

const LIST_DELIMITER = ";"

// Single quotes keep every other character literal for both bash and dotenv.
const UNQUOTABLE = /['\r\n]/

/**
 * @returns Whether the value can be written between single quotes and read back unchanged
 * by bash `source` and dotenv alike.
 */
export const isQuotableValue = (value: string): boolean => {
  return !UNQUOTABLE.test(value)
}

const quoteValue = (value: string): string => `'${value}'`

const listTemplate = (key: string, values: string[]): string => {
  return `${key}=${quoteValue(values.join(LIST_DELIMITER))}`
}

/**
 * Assembles the backend's environment with both providers enabled. Keys and their order are
 * fixed so repeated setups produce the same file for the same key.
 *
 * @param input.credential Remote API key, also seeded into the inactive multi-key template.
 * @returns Config sections plus the commented-out multi-provider templates.
 */
export const buildRuntimeConfig = ({ credential }: BuildRuntimeConfigInput): RuntimeConfig => {
  return {
    sections: [
      {
        title: "OpenAI Configuration",
        entries: [
          { key: "OPENAI_API_KEY", value: credential.key },
          { key: "OPENAI_API_BASE_URL", value: REMOTE_API_BASE_URL },
          { key: "ENABLE_OPENAI_API", value: ENABLED },
        ],
      },
      {
        title: "Ollama Configuration",
        entries: [
          { key: "OLLAMA_BASE_URL", value: LOCAL_INFERENCE_BASE_URL },
          { key: "ENABLE_OLLAMA_API", value: ENABLED },
        ],
      },
      {
        title: "Development settings",
        entries: [
          { key: "CORS_ALLOW_ORIGIN", value: FRONTEND_URL },
          { key: "ENV", value: "dev" },
          { key: "PORT", value: String(BACKEND_PORT) },
        ],
      },
      {
        title: "Enable both providers simultaneously",
        entries: [{ key: "ENABLE_DIRECT_CONNECTIONS", value: ENABLED }],
      },
    ],
    templates: [
      listTemplate("OPENAI_API_BASE_URLS", [
        REMOTE_API_BASE_URL,
        "https://api.openrouter.ai/api/v1",
      ]),
      listTemplate("OPENAI_API_KEYS", [credential.key, "sk-your-other-key"]),
      listTemplate("OLLAMA_BASE_URLS", [LOCAL_INFERENCE_BASE_URL, "http://another-server:11434"]),
    ],
  }
}

/**
 * @returns Every active entry in section order.
 */
export const listRuntimeConfigEntries = (config: RuntimeConfig): RuntimeConfigEntry[] => {
  return config.sections.flatMap((section) => section.entries)
}

/**
 * Checks that every value survives single quoting and that each enabled provider has its
 * paired keys.
 *
 * @returns One message per violation; empty when the config is valid.
 */
export const findRuntimeConfigViolations = (config: RuntimeConfig): string[] => {
  const values = new Map(listRuntimeConfigEntries(config).map((entry) => [entry.key, entry.value]))
  const violations: string[] = []

  for (const [key, value] of values) {
    if (!isQuotableValue(value)) {
      violations.push(`${key} contains a single quote or a line break`)
    }
  }

  for (const { flag, requires } of ENABLEMENT_DEPENDENCIES) {
    if (values.get(flag) !== ENABLED) {
      continue
    }

    for (const dependency of requires) {
      if (!values.get(dependency)?.trim()) {
        violations.push(`${flag} requires non-empty ${dependency}`)
      }
    }
  }

  return violations
}

/**
 * Renders the artifact as `KEY='value'` lines. The backend launcher sources this file from
 * bash and `devstack check` parses it with dotenv, so values are single-quoted to read the
 * same in both.
 *
 * @param config Config that already passed `findRuntimeConfigViolations`.
 * @returns File contents ending with a newline.
 */
export const renderRuntimeConfig = (config: RuntimeConfig): string => {
  const blocks = config.sections.map((section) =>
    [
      `# ${section.title}`,
      ...section.entries.map((entry) => `${entry.key}=${quoteValue(entry.value)}`),
    ].join("\n")
  )

  blocks.push(
    [
      "# Optional: Uncomment to add multiple providers",
      ...config.templates.map((line) => `# ${line}`),
    ].join("\n")
  )

  return `${blocks.join("\n\n")}\n`
}

/**
 * Writes the artifact, replacing whatever was there before.
 *
 * @returns Rendered file contents.
 */
export const writeRuntimeConfig = async (
  configPath: string,
  config: RuntimeConfig
): Promise<string> => {
  const violations = findRuntimeConfigViolations(config)

  if (violations.length > 0) {
    throw new RuntimeConfigInvariantError(violations)
  }

  const rendered = renderRuntimeConfig(config)

  await mkdir(path.dirname(configPath), { recursive: true })
  await writeFile(configPath, rendered, "utf8")

  return rendered
}

/**
 * @param source Contents of a previously written artifact.
 * @returns Active key/value pairs; commented templates are skipped.
 */
export const parseRuntimeConfig = (source: string): Record<string, string> => {
  return parse(source)
}

/**
 * @returns Parsed key/value pairs, or `null` when no artifact has been written yet.
 */
export const readRuntimeConfig = async (
  configPath: string
): Promise<Record<string, string> | null> => {
  try {
    return parseRuntimeConfig(await readFile(configPath, "utf8"))
  } catch (error) {
    const err = error as NodeJS.ErrnoException

    if (err.code === "ENOENT") {
      return null
    }

    throw error
  }
}
