import { USER_AGENT } from '../../core/sdk-info.ts'
import type { THttpMethod, TQueryParams } from '../../core/types.ts'
import { buildOperationUrl } from '../../core/utils.ts'
import type {
  TBatchLookupParams,
  TBatchLookupRequestBody,
  TLookupMyParams,
  TLookupParams,
  TLookupQuery,
} from '../../types/api.ts'

export const LOOKUP_PATH = 'v1/lookup'
export const LOOKUP_MY_PATH = 'v1/lookup/my'
export const BATCH_LOOKUP_PATH = 'v1/lookup/batch'

export type TRequestBody = string | Uint8Array

function toQuery(params?: TLookupQuery): TQueryParams {
  return { fields: params?.fields, locale_code: params?.locale_code }
}

function createRequest(
  httpMethod: THttpMethod,
  url: URL,
  init: { contentType?: string; body?: TRequestBody; signal?: AbortSignal } = {},
): Request {
  const headers: Headers = new Headers({ 'user-agent': USER_AGENT })
  if (init.contentType) headers.set('content-type', init.contentType)

  return new Request(url, {
    method: httpMethod,
    headers,
    body: init.body,
    signal: init.signal,
  })
}

/** GET v1/lookup/{ip} */
export function buildLookupRequest(
  server: string,
  ip: string,
  params?: TLookupParams,
  signal?: AbortSignal,
): Request {
  const url: URL = buildOperationUrl(
    server,
    `${LOOKUP_PATH}/${encodeURIComponent(ip)}`,
    toQuery(params),
  )
  return createRequest('GET', url, { signal })
}

/** GET v1/lookup/my. The server resolves the caller's address. */
export function buildLookupMyRequest(
  server: string,
  params?: TLookupMyParams,
  signal?: AbortSignal,
): Request {
  return createRequest('GET', buildOperationUrl(server, LOOKUP_MY_PATH, toQuery(params)), {
    signal,
  })
}

/** POST v1/lookup/batch with a JSON body. */
export function buildBatchLookupRequest(
  server: string,
  params: TBatchLookupParams | undefined,
  body: TBatchLookupRequestBody,
  signal?: AbortSignal,
): Request {
  return buildBatchLookupRequestWithBody(
    server,
    params,
    'application/json',
    JSON.stringify(body),
    signal,
  )
}

/** POST v1/lookup/batch with a pre-serialized body of the given content type. */
export function buildBatchLookupRequestWithBody(
  server: string,
  params: TBatchLookupParams | undefined,
  contentType: string,
  body: TRequestBody,
  signal?: AbortSignal,
): Request {
  return createRequest('POST', buildOperationUrl(server, BATCH_LOOKUP_PATH, toQuery(params)), {
    contentType,
    body,
    signal,
  })
}
