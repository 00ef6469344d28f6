import {isJsonObject, type JsonValue} from '../core/json.js'
import {ToolDefinition} from '../core/tool.js'

export const currentTimeTool = new ToolDefinition(
  'get_current_time',
  'Get the current date and time for an IANA timezone',
  {
    type: 'object',
    properties: {
      timezone: {
        type: 'string',
        description: 'Timezone (e.g., America/New_York, Europe/London, Asia/Tokyo)'
      }
    },
    required: ['timezone']
  }
)

/** Formats `now` as `YYYY-MM-DD HH:mm:ss` in the given timezone. */
export function formatTimeIn(timezone: string, now = new Date()): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(now)
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((part) => part.type === type)?.value ?? '00'
  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`
}

export function runCurrentTimeTool(args: JsonValue, now = new Date()): string {
  const timezone = isJsonObject(args) ? args.timezone : undefined
  if (typeof timezone !== 'string' || !timezone.trim()) {
    return 'Error: timezone is required'
  }
  try {
    return formatTimeIn(timezone, now)
  } catch {
    return `Error: Invalid timezone '${timezone}'`
  }
}
