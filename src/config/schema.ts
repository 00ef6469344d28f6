import {z} from 'zod'
import {requestConfigSchema} from '../core/request-config.js'
import {getTooltalkHome} from './paths.js'

const positiveInt = z.coerce.number().int().positive()

export const DEFAULT_MODEL = 'openai:gpt-4o-mini'

export const appConfigSchema = z.object({
  model: z.string().trim().min(1).default(DEFAULT_MODEL),
  baseURL: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().optional()
  ),
  homeDir: z.string().default(getTooltalkHome()),
  request: requestConfigSchema.default({}),
  runtime: z
    .object({
      timeoutMs: positiveInt.default(45_000),
      maxToolRounds: positiveInt.default(8)
    })
    .default({}),
  logging: z
    .object({
      exchanges: z.boolean().default(true)
    })
    .default({})
})

export type AppConfig = z.infer<typeof appConfigSchema>
