import { log } from '@shared/logger'
import {
  updateResponseSchema,
  type OkResponse,
  type UpdateRequest
} from '@shared/types'
import { Agent, request } from 'undici'
import { UPDATE_ENDPOINT_PATH } from '../../shared/constants'
import { ProtocolError, TransportError, TransportTimeoutError } from '../../shared/errors'

/**
 * Outcome of an exchange that reached the service and was decoded.
 * A `status: "error"` reply is a value here, not an exception.
 */
export type UpdateResult =
  | { status: 'ok'; response: OkResponse }
  | { status: 'rejected'; message: string }

/**
 * Anything that can carry an update request to the tracking service.
 */
export interface UpdateSender {
  send(request: UpdateRequest, timeoutMs: number): Promise<UpdateResult>
}

export type Credentials = {
  username: string
  password: string
}

export type UpdateRequestClientOptions = {
  /** Base URL of the tracking service */
  serviceUrl: string
  credentials?: Credentials
  /** Skip TLS certificate verification */
  insecure?: boolean
}

/** undici error codes that mean "gave up waiting" */
const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_ABORTED'
])

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
}

function isTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false
  }
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true
  }
  const code = 'code' in error ? error.code : undefined
  return typeof code === 'string' && TIMEOUT_CODES.has(code)
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Single request/response exchange with the tracking service's update endpoint.
 */
export class UpdateRequestClient implements UpdateSender {
  private readonly endpoint: string
  private readonly dispatcher: Agent
  private readonly headers: Record<string, string>

  constructor(options: UpdateRequestClientOptions) {
    this.endpoint = joinUrl(options.serviceUrl, UPDATE_ENDPOINT_PATH)
    this.dispatcher = new Agent({
      connect: options.insecure ? { rejectUnauthorized: false } : undefined
    })
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json'
    }

    if (options.credentials) {
      const { username, password } = options.credentials
      const token = Buffer.from(`${username}:${password}`).toString('base64')
      this.headers.Authorization = `Basic ${token}`
    }
  }

  /**
   * Posts the request and decodes the reply.
   *
   * @throws TransportTimeoutError if no complete reply arrives within `timeoutMs`
   * @throws TransportError on connection failures and non-success status codes
   * @throws ProtocolError if the body is not a valid update response
   */
  async send(updateRequest: UpdateRequest, timeoutMs: number): Promise<UpdateResult> {
    const timeout = Math.max(0, Math.ceil(timeoutMs))
    let payload: unknown

    try {
      const { statusCode, body } = await request(this.endpoint, {
        method: 'POST',
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(timeout),
        headers: this.headers,
        body: JSON.stringify(updateRequest)
      })

      if (statusCode < 200 || statusCode >= 300) {
        const text = await body.text()
        throw new TransportError(
          `Tracking service replied with status ${statusCode}: ${text}`,
          statusCode
        )
      }

      const text = await body.text()
      try {
        payload = JSON.parse(text)
      } catch (error) {
        throw new ProtocolError('Reply is not valid JSON', error)
      }
    } catch (error) {
      if (error instanceof TransportError || error instanceof ProtocolError) {
        throw error
      }
      if (isTimeout(error)) {
        throw new TransportTimeoutError(`No reply within ${timeout}ms`, timeout, error)
      }
      throw new TransportError(
        `Request to ${this.endpoint} failed: ${errorMessage(error)}`,
        undefined,
        error
      )
    }

    const parsed = updateResponseSchema.safeParse(payload)
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join(', ')
      log.debug('[UpdateRequestClient] Undecodable reply:', payload)
      throw new ProtocolError(`Unexpected reply from tracking service: ${issues}`, parsed.error)
    }

    if (parsed.data.status === 'error') {
      return { status: 'rejected', message: parsed.data.error }
    }

    return { status: 'ok', response: parsed.data }
  }

  /**
   * Closes pooled connections so the process can exit.
   */
  async close(): Promise<void> {
    await this.dispatcher.close()
  }
}
