import {z} from 'zod'
import {ValidationError, formatZodError} from './errors.js'
import {parseJsonText} from './json.js'

const tokenCount = z.number().int().nonnegative()

export const usageRecordSchema = z.object({
  prompt_tokens: tokenCount,
  output_tokens: tokenCount,
  total_tokens: tokenCount.optional()
})

export type UsageRecord = {
  prompt_tokens: number
  output_tokens: number
  total_tokens: number
}

function assertTokenCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`Usage ${name} must be a non-negative integer, got ${value}`)
  }
}

/**
 * Token accounting for one exchange. A total reported by the provider is kept as-is,
 * even when it differs from prompt + output; the sum is only a fallback.
 */
export class Usage {
  readonly promptTokens: number
  readonly outputTokens: number
  readonly totalTokens: number

  constructor(promptTokens: number, outputTokens: number, totalTokens?: number) {
    assertTokenCount('prompt_tokens', promptTokens)
    assertTokenCount('output_tokens', outputTokens)
    if (totalTokens !== undefined) assertTokenCount('total_tokens', totalTokens)
    this.promptTokens = promptTokens
    this.outputTokens = outputTokens
    this.totalTokens = totalTokens ?? promptTokens + outputTokens
    Object.freeze(this)
  }

  static empty(): Usage {
    return new Usage(0, 0)
  }

  static fromRecord(data: unknown): Usage {
    const parsed = usageRecordSchema.safeParse(data)
    if (!parsed.success) {
      throw new ValidationError(`Invalid usage record: ${formatZodError(parsed.error)}`, parsed.error)
    }
    return new Usage(parsed.data.prompt_tokens, parsed.data.output_tokens, parsed.data.total_tokens)
  }

  static fromJson(text: string): Usage {
    return Usage.fromRecord(parseJsonText(text, 'usage'))
  }

  getPromptTokens(): number {
    return this.promptTokens
  }

  getOutputTokens(): number {
    return this.outputTokens
  }

  getTotalTokens(): number {
    return this.totalTokens
  }

  add(other: Usage): Usage {
    return new Usage(
      this.promptTokens + other.promptTokens,
      this.outputTokens + other.outputTokens,
      this.totalTokens + other.totalTokens
    )
  }

  toRecord(): UsageRecord {
    return {
      prompt_tokens: this.promptTokens,
      output_tokens: this.outputTokens,
      total_tokens: this.totalTokens
    }
  }

  toJson(): string {
    return JSON.stringify(this.toRecord())
  }
}
