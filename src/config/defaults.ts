export const LOCAL_INFERENCE_BASE_URL = "http://localhost:11434"
export const REMOTE_API_BASE_URL = "https://api.openai.com/v1"

export const BACKEND_URL = "http://localhost:8080"
export const FRONTEND_URL = "http://localhost:5173"
export const BACKEND_PORT = 8080

export const CREDENTIAL_ENV_VAR = "OPENAI_API_KEY"

export const BACKEND_DIRECTORY = "backend"
export const VIRTUAL_ENV_DIRECTORY = "venv"
export const RUNTIME_CONFIG_FILE = ".env.dev"

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000
export const DEFAULT_STARTUP_DELAY_MS = 3_000
