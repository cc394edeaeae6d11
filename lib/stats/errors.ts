export type StatsErrorCode =
  | 'INVALID_POSITION'
  | 'INVALID_CATEGORY'
  | 'NO_SCHEDULE_DATA'
  | 'PLAYER_NOT_FOUND'
  | 'DATA_UNAVAILABLE'
  | 'BAD_REQUEST'

const STATUS_BY_CODE: Record<StatsErrorCode, number> = {
  INVALID_POSITION: 400,
  INVALID_CATEGORY: 400,
  NO_SCHEDULE_DATA: 404,
  PLAYER_NOT_FOUND: 404,
  DATA_UNAVAILABLE: 503,
  BAD_REQUEST: 400,
}

export class StatsError extends Error {
  readonly code: StatsErrorCode
  readonly status: number
  readonly details?: unknown

  constructor(code: StatsErrorCode, message: string, options?: { details?: unknown; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'StatsError'
    this.code = code
    this.status = STATUS_BY_CODE[code]
    this.details = options?.details
  }
}

export function isStatsError(err: unknown): err is StatsError {
  return err instanceof StatsError
}

/** Wire shape of an error response body */
export type StatsErrorPayload = {
  code: StatsErrorCode | 'UNKNOWN_ERROR' | 'NETWORK_ERROR' | string
  status: number | null
  message: string
  details?: unknown
}

export function toErrorPayload(err: unknown): StatsErrorPayload {
  if (isStatsError(err)) {
    return { code: err.code, status: err.status, message: err.message, details: err.details }
  }
  return {
    code: 'UNKNOWN_ERROR',
    status: 500,
    message: err instanceof Error ? err.message : 'Unexpected error',
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

export function decodeStatsErrorPayload(params: {
  status: number | null
  json?: unknown
  text?: string
}): StatsErrorPayload {
  const { status, json, text } = params

  if (isRecord(json)) {
    const code = typeof json.code === 'string' ? json.code : status === 400 ? 'BAD_REQUEST' : 'UNKNOWN_ERROR'
    const message =
      (typeof json.message === 'string' && json.message) ||
      (typeof json.error === 'string' && json.error) ||
      (status ? `Stats error ${status}` : 'Stats error')
    return { code, status, message, details: json.details }
  }

  const raw = typeof text === 'string' ? text.trim() : ''
  return {
    code: status === 503 ? 'DATA_UNAVAILABLE' : 'UNKNOWN_ERROR',
    status,
    message: raw ? raw.slice(0, 300) : status ? `Stats error ${status}` : 'Stats error',
  }
}

export async function decodeStatsErrorFromResponse(res: Response): Promise<StatsErrorPayload> {
  const status = typeof res.status === 'number' ? res.status : null
  const contentType = res.headers.get('content-type') ?? ''

  if (contentType.includes('application/json')) {
    const json: unknown = await res.json().catch(() => null)
    return decodeStatsErrorPayload({ status, json })
  }

  const text = await res.text().catch(() => '')
  return decodeStatsErrorPayload({ status, text })
}
