import { STATUS_CODES } from 'http'
import { ConfigurationError } from './errors.ts'
import type { TQueryParams } from './types.ts'

/** Validates the server URL and guarantees exactly one trailing slash is present. */
export function normalizeBaseUrl(url: string): string {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new ConfigurationError(`Invalid server URL: ${url}`)
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`Unsupported server URL protocol: ${parsed.protocol}`)
  }
  return url.endsWith('/') ? url : `${url}/`
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved = override ?? (globalThis as unknown as { fetch?: typeof fetch }).fetch
  if (!resolved) {
    throw new ConfigurationError(
      'No fetch implementation available. Provide a fetchImplementation option or use Node.js >= 20.',
    )
  }
  return resolved
}

/**
 * Resolves an operation path against the server. The leading slash is dropped so
 * a base path on the server (e.g. https://host/api/) is kept.
 */
export function buildOperationUrl(server: string, operationPath: string, query?: TQueryParams): URL {
  const url: URL = new URL(`./${operationPath.replace(/^\/+/, '')}`, server)
  if (query) {
    for (const [queryKey, queryValue] of Object.entries(query)) {
      if (queryValue !== undefined) url.searchParams.set(queryKey, String(queryValue))
    }
  }
  return url
}

export function isJsonContentType(contentType: string | null): boolean {
  return contentType !== null && contentType.includes('json')
}

/** Formats status code and reason phrase as "200 OK", falling back to the standard phrase. */
export function formatStatus(response: Response): string {
  const reason: string = response.statusText || STATUS_CODES[response.status] || ''
  return reason ? `${response.status} ${reason}` : String(response.status)
}
