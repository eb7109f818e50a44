export type THttpMethod = 'GET' | 'POST'

/**
 * Executes a fully built request. Implementations must not retry or interpret
 * status codes; a rejected promise is a transport failure.
 */
export type THttpClient = {
  send(request: Request): Promise<Response>
}

/**
 * Runs against every outbound request before it is sent. May mutate the
 * request in place (headers) or return a replacement. Throwing aborts the call.
 */
export type TRequestEditorFn = (
  request: Request,
  signal?: AbortSignal,
) => void | Request | Promise<void | Request>

export type TCallOptions = {
  /** Forwarded to the transport through `Request.signal` */
  signal?: AbortSignal
  /** Run after the client-level editors, in order */
  requestEditors?: TRequestEditorFn[]
}

export type TQueryParams = Record<string, string | number | boolean | undefined>
