/** Default API server */
export const API_SERVER = 'https://api.ip-sonar.com'

/** Header carrying the API key. Attach it with `withApiKey` or a request editor. */
export const API_KEY_HEADER = 'X-API-Key'

/**
 * Geolocation of a single IP address. Every field is optional: a missing key
 * means the value is unknown, which is not the same as an empty string.
 */
export type TIPGeolocation = {
  ip?: string
  country_code?: string
  country_name?: string
  city_name?: string
  continent_code?: string
  continent_name?: string
  /** Single precision on the wire */
  latitude?: number
  /** Single precision on the wire */
  longitude?: number
  timezone?: string
  postal_code?: string
  /** Meters */
  accuracy_radius?: number
  is_in_eu?: boolean
  subdivision_1_code?: string
  subdivision_1_name?: string
  subdivision_2_code?: string
  subdivision_2_name?: string
}

export type TLookupQuery = {
  /** Comma-separated list of fields to return, e.g. "ip,country_code" */
  fields?: string
  locale_code?: string
}

export type TLookupParams = TLookupQuery
export type TLookupMyParams = TLookupQuery
export type TBatchLookupParams = TLookupQuery

export type TBatchLookupRequestBody = {
  data: string[]
}

export type TBatchLookupIPResponse = {
  data?: TIPGeolocation[]
}

export type TErrorResponse = {
  message: string
}
