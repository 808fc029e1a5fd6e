import {z} from 'zod'

export const DEFAULT_MODEL = 'anthropic/claude-haiku-4.5'
export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1'

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value
}

export const appConfigSchema = z.object({
  apiKey: z.string().trim().min(1),
  model: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_MODEL)),
  baseURL: z.preprocess(blankToUndefined, z.string().trim().url().default(DEFAULT_BASE_URL)),
  workspace: z.string().default(process.cwd()),
  runtime: z
    .object({
      modelTimeoutMs: positiveInt.default(120_000),
      modelRetryCount: nonNegativeInt.default(1),
      maxSteps: positiveInt.default(50),
      shellTimeoutMs: positiveInt.default(120_000)
    })
    .default({})
})

export type AppConfig = z.infer<typeof appConfigSchema>

export function redactConfig(config: AppConfig): AppConfig {
  return {...config, apiKey: '[redacted]'}
}
