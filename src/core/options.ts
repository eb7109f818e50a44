import { API_KEY_HEADER } from '../types/api.ts'
import { FetchHttpClient } from './transport.ts'
import type { THttpClient, TRequestEditorFn } from './types.ts'
import { normalizeBaseUrl } from './utils.ts'

export type TClientConfig = {
  server: string
  httpClient?: THttpClient
  requestEditors: TRequestEditorFn[]
}

/** Mutates the client configuration. Options apply in order; later ones win. */
export type TClientOption = (config: TClientConfig) => void

/** Replaces the transport used to send requests. */
export function withHttpClient(httpClient: THttpClient): TClientOption {
  return (config) => {
    config.httpClient = httpClient
  }
}

/** Sends requests through a custom fetch implementation. */
export function withFetch(fetchImplementation: typeof fetch): TClientOption {
  return (config) => {
    config.httpClient = new FetchHttpClient({ fetchImplementation })
  }
}

/** Overrides the server passed to the constructor. */
export function withBaseUrl(baseUrl: string): TClientOption {
  return (config) => {
    config.server = normalizeBaseUrl(baseUrl)
  }
}

/** Appends an editor that runs on every request made by the client. */
export function withRequestEditorFn(editor: TRequestEditorFn): TClientOption {
  return (config) => {
    config.requestEditors.push(editor)
  }
}

/** Attaches the API key header to every request. */
export function withApiKey(apiKey: string): TClientOption {
  return withRequestEditorFn((request) => {
    request.headers.set(API_KEY_HEADER, apiKey)
  })
}

export function applyClientOptions(server: string, options: TClientOption[]): {
  server: string
  httpClient: THttpClient
  requestEditors: TRequestEditorFn[]
} {
  const config: TClientConfig = { server, requestEditors: [] }
  for (const option of options) option(config)

  return {
    server: normalizeBaseUrl(config.server),
    httpClient: config.httpClient ?? new FetchHttpClient(),
    requestEditors: config.requestEditors,
  }
}
