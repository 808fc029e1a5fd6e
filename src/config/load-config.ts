import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath, getLocalEnvPath} from './paths.js'
import {StartupError, errorMessage} from '../core/errors.js'

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function positiveIntFromEnv(name: string): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

function nonNegativeIntFromEnv(name: string): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Resolves the run configuration once at startup.
 *
 * Precedence: environment (including `.env` files) over the `toolloop` cosmiconfig
 * file over schema defaults. The API key is only ever taken from the environment.
 */
export async function loadConfig(): Promise<AppConfig> {
  dotenv.config({path: getGlobalEnvPath()})
  dotenv.config({path: getLocalEnvPath()})

  const explorer = cosmiconfig('toolloop')
  let base: Record<string, unknown> = {}
  try {
    const result = await explorer.search()
    if (isRecord(result?.config)) base = result.config
  } catch (error) {
    throw new StartupError(`Failed to read toolloop config: ${errorMessage(error)}`, {cause: error})
  }
  const baseRuntime = isRecord(base.runtime) ? base.runtime : {}

  const apiKey = nonEmpty(process.env.OPENROUTER_API_KEY)
  if (!apiKey) {
    throw new StartupError('OPENROUTER_API_KEY is not set. Set it in your environment or .env file.')
  }

  const modelTimeoutMs = positiveIntFromEnv('TOOLLOOP_MODEL_TIMEOUT_MS')
  const modelRetryCount = nonNegativeIntFromEnv('TOOLLOOP_MODEL_RETRY_COUNT')
  const maxSteps = positiveIntFromEnv('TOOLLOOP_MAX_STEPS')
  const shellTimeoutMs = positiveIntFromEnv('TOOLLOOP_SHELL_TIMEOUT_MS')

  const merged: Record<string, unknown> = {
    ...base,
    apiKey,
    model: nonEmpty(process.env.TOOLLOOP_MODEL) ?? base.model,
    baseURL: nonEmpty(process.env.OPENROUTER_BASE_URL) ?? base.baseURL,
    runtime: {
      ...baseRuntime,
      ...(modelTimeoutMs !== undefined ? {modelTimeoutMs} : {}),
      ...(modelRetryCount !== undefined ? {modelRetryCount} : {}),
      ...(maxSteps !== undefined ? {maxSteps} : {}),
      ...(shellTimeoutMs !== undefined ? {shellTimeoutMs} : {})
    }
  }

  const parsed = appConfigSchema.safeParse(merged)
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new StartupError(`Invalid toolloop configuration: ${details.join('; ')}`)
  }

  return parsed.data
}
