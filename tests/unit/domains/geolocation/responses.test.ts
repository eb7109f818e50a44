import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest'
import { ResponseDecodeError } from '../../../../src/core/errors.ts'
import {
  parseBatchLookupResponse,
  parseLookupMyResponse,
  parseLookupResponse,
} from '../../../../src/domains/geolocation/geolocation.responses.ts'
import { makeBatchResponse, makeGeolocation } from '../../../helpers/factories.ts'

function makeResponse(
  status: number,
  body: unknown,
  contentType = 'application/json',
): Response {
  const text = typeof body === 'string' ? body : JSON.stringify(body)
  return new Response(text, { status, headers: { 'content-type': contentType } })
}

describe('geolocation response parsing', () => {
  let warnSpy: MockInstance

  beforeEach(() => {
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('parseLookupResponse', () => {
    it('decodes a 200 geolocation body', async () => {
      const geolocation = makeGeolocation({ ip: '192.168.1.1' })

      const response = await parseLookupResponse(makeResponse(200, geolocation))

      expect(response.statusCode).toBe(200)
      expect(response.status).toBe('200 OK')
      expect(response.json200).toEqual(geolocation)
      expect(response.json200?.ip).toBe('192.168.1.1')
      expect(new TextDecoder().decode(response.body)).toBe(JSON.stringify(geolocation))
    })

    it.each([
      [401, 'json401', 'Unauthorized'],
      [404, 'json404', 'Not Found'],
      [422, 'json422', 'Invalid IP address'],
      [429, 'json429', 'Too Many Requests'],
    ] as const)('decodes a %i error body into %s', async (status, field, message) => {
      const response = await parseLookupResponse(makeResponse(status, { message }))

      expect(response.statusCode).toBe(status)
      expect(response[field]).toEqual({ message })
      expect(response.json200).toBeUndefined()
    })

    it('leaves 500 undecoded but keeps status and body', async () => {
      const body = '{"message":"Internal Server Error"}'

      const response = await parseLookupResponse(makeResponse(500, body))

      expect(response.statusCode).toBe(500)
      expect(response.status).toBe('500 Internal Server Error')
      expect(new TextDecoder().decode(response.body)).toBe(body)
      expect(response).not.toHaveProperty('json200')
      expect(response).not.toHaveProperty('json401')
      expect(response).not.toHaveProperty('json404')
      expect(response).not.toHaveProperty('json422')
      expect(response).not.toHaveProperty('json429')
      expect(warnSpy).not.toHaveBeenCalled()
    })

    it('does not decode a declared status without a JSON content type', async () => {
      const response = await parseLookupResponse(
        makeResponse(200, '<html>maintenance</html>', 'text/html'),
      )

      expect(response.statusCode).toBe(200)
      expect(response.json200).toBeUndefined()
      expect(warnSpy).toHaveBeenCalledWith(
        '[ip-sonar]',
        'lookup: HTTP 200 response has content type text/html, leaving body undecoded',
      )
    })

    it('rejects with ResponseDecodeError on malformed JSON', async () => {
      await expect(parseLookupResponse(makeResponse(200, '{"ip":'))).rejects.toBeInstanceOf(
        ResponseDecodeError,
      )
    })

    it('decodes an error body without a message to an empty message', async () => {
      const response = await parseLookupResponse(makeResponse(401, { error: 'bad key' }))

      expect(response.statusCode).toBe(401)
      expect(response.json401).toEqual({ message: '' })
    })

    it('rejects with ResponseDecodeError when the message is not a string', async () => {
      await expect(parseLookupResponse(makeResponse(404, { message: 404 }))).rejects.toThrow(
        'HTTP 404 response body is not a valid ErrorResponse',
      )
    })

    it('decodes a null 200 body to an empty geolocation', async () => {
      const response = await parseLookupResponse(makeResponse(200, 'null'))

      expect(response.json200).toEqual({})
    })

    it('propagates body read failures', async () => {
      const failingBody = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.error(new Error('socket hang up'))
        },
      })
      const httpResponse = new Response(failingBody, {
        status: 200,
        headers: { 'content-type': 'application/json' },
      })

      await expect(parseLookupResponse(httpResponse)).rejects.toThrow('socket hang up')
    })
  })

  describe('parseLookupMyResponse', () => {
    it('decodes a 200 geolocation body', async () => {
      const geolocation = makeGeolocation()

      const response = await parseLookupMyResponse(makeResponse(200, geolocation))

      expect(response.json200).toEqual(geolocation)
    })

    it.each([
      [401, 'json401', 'Unauthorized'],
      [422, 'json422', 'Unsupported locale'],
      [429, 'json429', 'Too Many Requests'],
      [500, 'json500', 'Internal Server Error'],
    ] as const)('decodes a %i error body into %s', async (status, field, message) => {
      const response = await parseLookupMyResponse(makeResponse(status, { message }))

      expect(response[field]).toEqual({ message })
    })

    it('leaves 404 undecoded', async () => {
      const response = await parseLookupMyResponse(makeResponse(404, { message: 'Not Found' }))

      expect(response.statusCode).toBe(404)
      expect(response).not.toHaveProperty('json401')
      expect(response).not.toHaveProperty('json500')
    })
  })

  describe('parseBatchLookupResponse', () => {
    it('decodes every entry in submission order', async () => {
      const ips = ['192.168.1.1', '10.0.0.1', '172.16.0.1']

      const response = await parseBatchLookupResponse(makeResponse(200, makeBatchResponse(ips)))

      expect(response.json200?.data).toHaveLength(3)
      expect(response.json200?.data?.map((geolocation) => geolocation.ip)).toEqual(ips)
    })

    it.each([
      [401, 'json401', 'Unauthorized'],
      [422, 'json422', 'Too many addresses'],
      [429, 'json429', 'Too Many Requests'],
      [500, 'json500', 'Internal Server Error'],
    ] as const)('decodes a %i error body into %s', async (status, field, message) => {
      const response = await parseBatchLookupResponse(makeResponse(status, { message }))

      expect(response[field]).toEqual({ message })
    })

    it('leaves 404 undecoded', async () => {
      const response = await parseBatchLookupResponse(makeResponse(404, { message: 'Not Found' }))

      expect(response.statusCode).toBe(404)
      expect(response.status).toBe('404 Not Found')
      expect(response).not.toHaveProperty('json200')
      expect(response).not.toHaveProperty('json401')
      expect(response).not.toHaveProperty('json500')
    })

    it('keeps null entries as empty geolocations', async () => {
      const response = await parseBatchLookupResponse(
        makeResponse(200, '{"data":[null,{"ip":"10.0.0.1"}]}'),
      )

      const ips: Array<string | undefined> = []
      for (const geolocation of response.json200?.data ?? []) ips.push(geolocation.ip)

      expect(response.json200?.data).toEqual([{}, { ip: '10.0.0.1' }])
      expect(ips).toEqual([undefined, '10.0.0.1'])
    })

    it('rejects with ResponseDecodeError when data is not a list', async () => {
      await expect(
        parseBatchLookupResponse(makeResponse(200, { data: { ip: '10.0.0.1' } })),
      ).rejects.toThrow('HTTP 200 response body is not a valid BatchLookupIPResponse')
    })
  })
})
