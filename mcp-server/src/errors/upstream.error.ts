export interface UpstreamErrorOptions {
  status?: number
  statusText?: string
  cause?: unknown
}

export class UpstreamError extends Error {
  readonly status?: number
  readonly statusText?: string

  constructor(message: string, options: UpstreamErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'UpstreamError'
    this.status = options.status
    this.statusText = options.statusText
  }

  static fromResponse(status: number, statusText: string): UpstreamError {
    const detail = statusText ? `${status} ${statusText}` : `${status}`
    return new UpstreamError(detail, { status, statusText })
  }
}
