import { Tool } from '@modelcontextprotocol/sdk/types.js'

import { BaseTool } from './base.tool.js'
import { ServerConfig } from '../config.js'
import { UpstreamError } from '../errors/upstream.error.js'
import { buildCitation } from '../helpers/citation.js'
import {
  buildGetDemographicsArgsSchema,
  buildGetDemographicsInputSchema,
  GetDemographicsArgs,
} from '../schema/get-demographics.schema.js'
import { UnhcrApiService } from '../services/unhcr-api.service.js'
import { ToolResult } from '../types/base.types.js'

export const toolDescription = `
  Fetches refugee demographic statistics from the UNHCR Refugee Population Statistics API. Use this tool when users ask about the age or sex breakdown of refugees and other displaced populations for a given year, optionally narrowed to a country of origin (coo) and/or country of asylum (coa) given as ISO3 codes. Returns the API response as JSON, unmodified, followed by a source citation.
`

export class GetDemographicsTool extends BaseTool<GetDemographicsArgs> {
  name = 'get_demographics'
  description = toolDescription
  inputSchema: Tool['inputSchema']

  private apiService: UnhcrApiService
  private defaultLimit: number

  get argsSchema() {
    return buildGetDemographicsArgsSchema(this.defaultLimit)
  }

  constructor(
    config: Pick<
      ServerConfig,
      'apiBaseUrl' | 'requestTimeoutMs' | 'defaultLimit' | 'fetch'
    >,
  ) {
    super()
    this.handler = this.handler.bind(this)
    this.defaultLimit = config.defaultLimit
    this.inputSchema = buildGetDemographicsInputSchema(config.defaultLimit)
    this.apiService = new UnhcrApiService({
      baseUrl: config.apiBaseUrl,
      timeoutMs: config.requestTimeoutMs,
      fetch: config.fetch,
    })
  }

  protected async toolHandler(args: GetDemographicsArgs): Promise<ToolResult> {
    try {
      const { url, body } = await this.apiService.fetchDemographics(args)

      return this.createSuccessResponse(body, buildCitation(url))
    } catch (err) {
      if (err instanceof UpstreamError) {
        console.error(`UNHCR API error: ${err.message}`)
        return this.createErrorResponse(`UNHCR API error: ${err.message}`)
      }
      throw err
    }
  }
}
