import { ResponseDecodeError } from '../../core/errors.ts'
import type { TBatchLookupIPResponse, TErrorResponse, TIPGeolocation } from '../../types/api.ts'

type TFieldKind = 'string' | 'number' | 'boolean'

const GEOLOCATION_FIELDS: Record<keyof TIPGeolocation, TFieldKind> = {
  ip: 'string',
  country_code: 'string',
  country_name: 'string',
  city_name: 'string',
  continent_code: 'string',
  continent_name: 'string',
  latitude: 'number',
  longitude: 'number',
  timezone: 'string',
  postal_code: 'string',
  accuracy_radius: 'number',
  is_in_eu: 'boolean',
  subdivision_1_code: 'string',
  subdivision_1_name: 'string',
  subdivision_2_code: 'string',
  subdivision_2_name: 'string',
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Known fields must carry the documented type when present; unknown keys are tolerated. */
export function isIPGeolocation(value: unknown): value is TIPGeolocation {
  if (!isRecord(value)) return false
  for (const [field, kind] of Object.entries(GEOLOCATION_FIELDS)) {
    const fieldValue: unknown = value[field]
    if (fieldValue === undefined) continue
    if (typeof fieldValue !== kind) return false
    if (field === 'accuracy_radius' && !Number.isInteger(fieldValue)) return false
  }
  return true
}

export function isBatchLookupIPResponse(value: unknown): value is TBatchLookupIPResponse {
  if (!isRecord(value)) return false
  if (value.data === undefined) return true
  return Array.isArray(value.data) && value.data.every(isIPGeolocation)
}

/** `message` may be missing; when present it must be a string. */
export function isErrorResponse(value: unknown): value is Partial<TErrorResponse> {
  return isRecord(value) && (value.message === undefined || typeof value.message === 'string')
}

/**
 * A JSON null object property is read as an absent key. A null array element
 * or root value is read as an empty object, so arrays keep their length.
 */
function readNulls(this: unknown, key: string, value: unknown): unknown {
  if (value !== null) return value
  if (Array.isArray(this) || key === '') return {}
  return undefined
}

/**
 * Parses a JSON body and checks it against a guard.
 * Throws ResponseDecodeError on malformed JSON or an unexpected shape.
 */
export function decodeJson<T>(
  bodyText: string,
  statusCode: number,
  guard: (value: unknown) => value is T,
  typeName: string,
): T {
  let parsed: unknown
  try {
    parsed = JSON.parse(bodyText, readNulls)
  } catch (error) {
    throw new ResponseDecodeError(
      `Failed to parse ${typeName} from HTTP ${statusCode} response`,
      statusCode,
      { cause: error },
    )
  }
  if (!guard(parsed)) {
    throw new ResponseDecodeError(
      `HTTP ${statusCode} response body is not a valid ${typeName}`,
      statusCode,
    )
  }
  return parsed
}
