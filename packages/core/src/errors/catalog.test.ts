import { describe, it, expect } from 'vitest'
import {
  SheetShelfError,
  PayloadDecodeError,
  UnreceivablePayloadError,
  UnsupportedPayloadError,
  SocketWriteError,
  RemoteStoreError,
  ItemNotFoundError,
  ConfigError,
  AdminSocketError,
  AdminRequestError,
  stackTraceOf,
} from './catalog.js'

describe('SheetShelfError', () => {
  it('has correct errorCode, message, and details', () => {
    const err = new SheetShelfError('BAD_THING', 'Bad thing', { reason: 'test' })

    expect(err.errorCode).toBe('BAD_THING')
    expect(err.message).toBe('Bad thing')
    expect(err.details).toEqual({ reason: 'test' })
    expect(err.name).toBe('SheetShelfError')
  })

  it('toJSON() returns serializable object', () => {
    const err = new SheetShelfError('BAD_THING', 'Bad thing', { field: 'name' })

    expect(err.toJSON()).toEqual({
      error: {
        errorCode: 'BAD_THING',
        message: 'Bad thing',
        details: { field: 'name' },
      },
    })

    // Omits details when undefined
    expect(new SheetShelfError('BAD_THING', 'Bad thing').toJSON()).toEqual({
      error: { errorCode: 'BAD_THING', message: 'Bad thing' },
    })
  })
})

describe('protocol errors', () => {
  it('PayloadDecodeError carries its code', () => {
    const err = new PayloadDecodeError('Malformed JSON')
    expect(err.errorCode).toBe('PAYLOAD_DECODE')
    expect(err).toBeInstanceOf(SheetShelfError)
  })

  it('UnreceivablePayloadError names the type', () => {
    const err = new UnreceivablePayloadError('LIST_RESPONSE')
    expect(err.message).toBe('Received unreceivable payload type: LIST_RESPONSE')
    expect(err.errorCode).toBe('UNRECEIVABLE_TYPE')
    expect(err.details).toEqual({ type: 'LIST_RESPONSE' })
  })

  it('UnsupportedPayloadError names the type', () => {
    const err = new UnsupportedPayloadError('LIST_REQUEST')
    expect(err.message).toBe('Unsupported payload type: LIST_REQUEST')
    expect(err.errorCode).toBe('UNSUPPORTED_TYPE')
  })

  it('SocketWriteError keeps the cause', () => {
    const cause = new Error('EPIPE')
    const err = new SocketWriteError(cause)
    expect(err.message).toBe('Failed to write to socket: EPIPE')
    expect(err.cause).toBe(cause)
  })
})

describe('remote store errors', () => {
  it('RemoteStoreError records the status', () => {
    const err = new RemoteStoreError('Drive error: 500 Internal', 500)
    expect(err.status).toBe(500)
    expect(err.details).toEqual({ status: 500 })
  })

  it('RemoteStoreError without status has no details', () => {
    expect(new RemoteStoreError('offline').details).toBeUndefined()
  })

  it('ItemNotFoundError is a 404 RemoteStoreError', () => {
    const err = new ItemNotFoundError('abc')
    expect(err).toBeInstanceOf(RemoteStoreError)
    expect(err.status).toBe(404)
    expect(err.itemId).toBe('abc')
    expect(err.message).toBe('Item not found: abc')
    expect(err.name).toBe('ItemNotFoundError')
  })
})

describe('ConfigError', () => {
  it('records the config path', () => {
    const err = new ConfigError('/tmp/config.json', 'Invalid config')
    expect(err.errorCode).toBe('CONFIG_INVALID')
    expect(err.details).toEqual({ configPath: '/tmp/config.json' })
  })
})

describe('admin errors', () => {
  it('AdminSocketError records the socket path', () => {
    const err = new AdminSocketError('/tmp/admin.sock', 'in use')
    expect(err.errorCode).toBe('ADMIN_SOCKET')
    expect(err.socketPath).toBe('/tmp/admin.sock')
    expect(err.toJSON()).toEqual({
      error: {
        errorCode: 'ADMIN_SOCKET',
        message: 'in use',
        details: { socketPath: '/tmp/admin.sock' },
      },
    })
  })

  it('AdminRequestError keeps the server error code and status', () => {
    const err = new AdminRequestError(503, 'REMOTE_STORE', 'Drive error')
    expect(err.errorCode).toBe('REMOTE_STORE')
    expect(err.status).toBe(503)
    expect(err.details).toEqual({ status: 503 })
    expect(err).toBeInstanceOf(SheetShelfError)
  })
})

describe('stackTraceOf', () => {
  it('returns the stack of an error', () => {
    const err = new Error('boom')
    expect(stackTraceOf(err)).toBe(err.stack)
  })

  it('falls back to name and message without a stack', () => {
    const err = new Error('boom')
    err.stack = undefined
    expect(stackTraceOf(err)).toBe('Error: boom')
  })

  it('stringifies non-errors', () => {
    expect(stackTraceOf('plain')).toBe('plain')
  })
})
