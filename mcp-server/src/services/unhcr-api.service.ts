import { UpstreamError } from '../errors/upstream.error.js'
import { GetDemographicsArgs } from '../schema/get-demographics.schema.js'
import { FetchLike } from '../types/base.types.js'

export interface UnhcrApiServiceOptions {
  baseUrl: string
  timeoutMs: number
  fetch: FetchLike
}

export interface DemographicsResponse {
  url: string
  // Response text exactly as received
  body: string
  data: unknown
}

export class UnhcrApiService {
  private baseUrl: string
  private timeoutMs: number
  private fetch: FetchLike

  constructor(options: UnhcrApiServiceOptions) {
    this.baseUrl = options.baseUrl
    this.timeoutMs = options.timeoutMs
    this.fetch = options.fetch
  }

  buildDemographicsUrl(query: GetDemographicsArgs): string {
    const params = new URLSearchParams({ year: query.year.toString() })

    if (query.coo) {
      params.append('coo', query.coo)
    }

    if (query.coa) {
      params.append('coa', query.coa)
    }

    params.append('limit', query.limit.toString())

    return `${this.baseUrl}?${params.toString()}`
  }

  async fetchDemographics(
    query: GetDemographicsArgs,
  ): Promise<DemographicsResponse> {
    const url = this.buildDemographicsUrl(query)
    const ctrl = new AbortController()
    const timeout = setTimeout(() => ctrl.abort(), this.timeoutMs)

    console.info(`URL Attempted: ${url}`)

    let body: string
    try {
      const res = await this.fetch(url, {
        headers: { Accept: 'application/json' },
        signal: ctrl.signal,
      })

      if (!res.ok) {
        throw UpstreamError.fromResponse(res.status, res.statusText)
      }

      body = await res.text()
    } catch (err) {
      throw this.toUpstreamError(err, ctrl.signal.aborted)
    } finally {
      clearTimeout(timeout)
    }

    try {
      return { url, body, data: JSON.parse(body) }
    } catch (err) {
      throw new UpstreamError('Invalid JSON in response', { cause: err })
    }
  }

  private toUpstreamError(err: unknown, timedOut: boolean): UpstreamError {
    if (err instanceof UpstreamError) {
      return err
    }

    if (timedOut) {
      return new UpstreamError(
        `Request timed out after ${this.timeoutMs}ms`,
        { cause: err },
      )
    }

    const message = err instanceof Error ? err.message : String(err)
    return new UpstreamError(message, { cause: err })
  }
}
