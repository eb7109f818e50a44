import { logger } from '../../core/logger.ts'
import { formatStatus, isJsonContentType } from '../../core/utils.ts'
import type { TBatchLookupIPResponse, TErrorResponse, TIPGeolocation } from '../../types/api.ts'
import {
  decodeJson,
  isBatchLookupIPResponse,
  isErrorResponse,
  isIPGeolocation,
} from './geolocation.decode.ts'

/** Fields present on every parsed response regardless of status. */
export type TRawResponse = {
  /** Whole response body */
  body: Uint8Array
  /** Underlying response. Its body has already been consumed. */
  httpResponse: Response
  statusCode: number
  /** Status code and reason phrase, e.g. "200 OK" */
  status: string
}

export type TLookupResponse = TRawResponse & {
  json200?: TIPGeolocation
  json401?: TErrorResponse
  json404?: TErrorResponse
  json422?: TErrorResponse
  json429?: TErrorResponse
}

export type TLookupMyResponse = TRawResponse & {
  json200?: TIPGeolocation
  json401?: TErrorResponse
  json422?: TErrorResponse
  json429?: TErrorResponse
  json500?: TErrorResponse
}

export type TBatchLookupResponse = TRawResponse & {
  json200?: TBatchLookupIPResponse
  json401?: TErrorResponse
  json422?: TErrorResponse
  json429?: TErrorResponse
  json500?: TErrorResponse
}

type TReadResponse = {
  raw: TRawResponse
  bodyText: string
  isJson: boolean
}

const DECLARED_STATUSES = {
  lookup: [200, 401, 404, 422, 429],
  lookupMy: [200, 401, 422, 429, 500],
  batchLookup: [200, 401, 422, 429, 500],
} as const

async function readResponse(
  httpResponse: Response,
  operation: keyof typeof DECLARED_STATUSES,
): Promise<TReadResponse> {
  const body: Uint8Array = new Uint8Array(await httpResponse.arrayBuffer())
  const isJson: boolean = isJsonContentType(httpResponse.headers.get('content-type'))

  const declared: readonly number[] = DECLARED_STATUSES[operation]
  if (!isJson && declared.includes(httpResponse.status)) {
    logger.warn(
      `${operation}: HTTP ${httpResponse.status} response has content type ` +
        `${httpResponse.headers.get('content-type') ?? '(none)'}, leaving body undecoded`,
    )
  }

  return {
    raw: {
      body,
      httpResponse,
      statusCode: httpResponse.status,
      status: formatStatus(httpResponse),
    },
    bodyText: new TextDecoder().decode(body),
    isJson,
  }
}

function decodeError(read: TReadResponse): TErrorResponse {
  const errorBody: Partial<TErrorResponse> = decodeJson(
    read.bodyText,
    read.raw.statusCode,
    isErrorResponse,
    'ErrorResponse',
  )
  return { message: errorBody.message ?? '' }
}

/** Reads and decodes a response to GET v1/lookup/{ip}. */
export async function parseLookupResponse(httpResponse: Response): Promise<TLookupResponse> {
  const read: TReadResponse = await readResponse(httpResponse, 'lookup')
  const response: TLookupResponse = { ...read.raw }
  if (!read.isJson) return response

  switch (response.statusCode) {
    case 200:
      response.json200 = decodeJson(read.bodyText, 200, isIPGeolocation, 'IPGeolocation')
      break
    case 401:
      response.json401 = decodeError(read)
      break
    case 404:
      response.json404 = decodeError(read)
      break
    case 422:
      response.json422 = decodeError(read)
      break
    case 429:
      response.json429 = decodeError(read)
      break
  }
  return response
}

/** Reads and decodes a response to GET v1/lookup/my. */
export async function parseLookupMyResponse(httpResponse: Response): Promise<TLookupMyResponse> {
  const read: TReadResponse = await readResponse(httpResponse, 'lookupMy')
  const response: TLookupMyResponse = { ...read.raw }
  if (!read.isJson) return response

  switch (response.statusCode) {
    case 200:
      response.json200 = decodeJson(read.bodyText, 200, isIPGeolocation, 'IPGeolocation')
      break
    case 401:
      response.json401 = decodeError(read)
      break
    case 422:
      response.json422 = decodeError(read)
      break
    case 429:
      response.json429 = decodeError(read)
      break
    case 500:
      response.json500 = decodeError(read)
      break
  }
  return response
}

/** Reads and decodes a response to POST v1/lookup/batch. */
export async function parseBatchLookupResponse(
  httpResponse: Response,
): Promise<TBatchLookupResponse> {
  const read: TReadResponse = await readResponse(httpResponse, 'batchLookup')
  const response: TBatchLookupResponse = { ...read.raw }
  if (!read.isJson) return response

  switch (response.statusCode) {
    case 200:
      response.json200 = decodeJson(
        read.bodyText,
        200,
        isBatchLookupIPResponse,
        'BatchLookupIPResponse',
      )
      break
    case 401:
      response.json401 = decodeError(read)
      break
    case 422:
      response.json422 = decodeError(read)
      break
    case 429:
      response.json429 = decodeError(read)
      break
    case 500:
      response.json500 = decodeError(read)
      break
  }
  return response
}
