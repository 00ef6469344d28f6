import {z} from 'zod'
import {ValidationError, formatZodError} from './errors.js'

export const requestConfigSchema = z
  .object({
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    topP: z.number().min(0).max(1).optional(),
    frequencyPenalty: z.number().min(-2).max(2).optional(),
    presencePenalty: z.number().min(-2).max(2).optional()
  })
  .strict()

/** Generation parameters. Anything left undefined falls back to the provider's default. */
export type RequestConfig = Readonly<z.infer<typeof requestConfigSchema>>

export function validateRequestConfig(config: unknown): RequestConfig {
  const parsed = requestConfigSchema.safeParse(config)
  if (!parsed.success) {
    throw new ValidationError(`Invalid request config: ${formatZodError(parsed.error)}`, parsed.error)
  }
  return parsed.data
}

/** Validates `patch` and layers it over `base`; the result is frozen. */
export function mergeRequestConfig(base: RequestConfig, patch: unknown): RequestConfig {
  const validated = validateRequestConfig(patch)
  const merged: Record<string, number> = {}
  for (const [key, value] of Object.entries({...base, ...validated})) {
    if (value !== undefined) merged[key] = value
  }
  return Object.freeze(validateRequestConfig(merged))
}
