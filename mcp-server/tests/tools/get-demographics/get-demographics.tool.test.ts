import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { DEFAULT_API_BASE_URL, loadConfig } from '../../../src/config.js'
import {
  GetDemographicsTool,
  toolDescription,
} from '../../../src/tools/get-demographics.tool.js'
import {
  createMockResponse,
  sampleDemographics,
  validateToolStructure,
} from '../../helpers/test-utils.js'

const { mockFetch } = vi.hoisted(() => ({ mockFetch: vi.fn() }))

vi.mock('node-fetch', () => ({
  default: mockFetch,
}))

describe('GetDemographicsTool', () => {
  let tool: GetDemographicsTool

  beforeEach(() => {
    tool = new GetDemographicsTool(loadConfig({}))
    mockFetch.mockReset()
  })

  afterEach(() => {
    vi.clearAllMocks()
  })

  describe('Tool Configuration', () => {
    it('should have correct tool metadata', () => {
      validateToolStructure(tool)
      expect(tool.name).toBe('get_demographics')
      expect(tool.description).toBe(toolDescription)
    })

    it('should have valid input schema', () => {
      const schema = tool.inputSchema
      expect(schema.type).toBe('object')
      expect(schema.properties).toHaveProperty('year')
      expect(schema.properties).toHaveProperty('coo')
      expect(schema.properties).toHaveProperty('coa')
      expect(schema.properties).toHaveProperty('limit')
      expect(schema.required).toEqual(['year'])
    })

    it('should default limit to 100 in the args schema', () => {
      expect(tool.argsSchema.parse({ year: 2022 })).toEqual({
        year: 2022,
        limit: 100,
      })
    })
  })

  describe('handler', () => {
    it('should relay the upstream body and cite the request', async () => {
      mockFetch.mockResolvedValue(createMockResponse(sampleDemographics))

      const args = tool.argsSchema.parse({ year: 2023, coo: 'syr', limit: 50 })
      const result = await tool.handler(args)

      const expectedUrl = `${DEFAULT_API_BASE_URL}?year=2023&coo=SYR&limit=50`
      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(mockFetch).toHaveBeenCalledWith(expectedUrl, {
        headers: { Accept: 'application/json' },
        signal: expect.any(AbortSignal),
      })
      expect(result).toEqual({
        content: [
          {
            type: 'text',
            text: JSON.stringify(sampleDemographics),
          },
          {
            type: 'text',
            text: `Source: UNHCR Refugee Population Statistics API (${expectedUrl})`,
          },
        ],
      })
      expect(JSON.parse(result.content[0].text)).toEqual(sampleDemographics)
    })

    it('should relay the response text without re-serializing it', async () => {
      const body = '{"total": 12345678901234567890, "items": [ ]}'
      mockFetch.mockResolvedValue(new Response(body, { status: 200 }))

      const result = await tool.handler({ year: 2023, limit: 100 })

      expect(result.content[0]).toEqual({ type: 'text', text: body })
    })

    it('should return an error result on an upstream 500', async () => {
      mockFetch.mockResolvedValue(
        createMockResponse({}, 500, 'Internal Server Error'),
      )

      const result = await tool.handler({ year: 2023, limit: 100 })

      expect(result).toEqual({
        content: [
          {
            type: 'text',
            text: 'UNHCR API error: 500 Internal Server Error',
          },
        ],
        isError: true,
      })
    })

    it('should return an error result on a network failure', async () => {
      mockFetch.mockRejectedValue(new Error('connect ECONNREFUSED'))

      const result = await tool.handler({ year: 2023, limit: 100 })

      expect(result).toEqual({
        content: [
          {
            type: 'text',
            text: 'UNHCR API error: connect ECONNREFUSED',
          },
        ],
        isError: true,
      })
    })
  })
})
