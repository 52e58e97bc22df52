import { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

export const MIN_YEAR = 1950
export const MAX_YEAR = 2025

const CountryCodeSchema = z
  .string()
  .regex(/^[A-Za-z]{3}$/, 'Expected a 3-letter ISO3 country code')
  .transform((code) => code.toUpperCase())

// Callers often send null or "" for an optional field they mean to leave out
function absentAsUndefined(value: unknown): unknown {
  return value === null || value === '' ? undefined : value
}

export function buildGetDemographicsArgsSchema(defaultLimit: number) {
  return z
    .object({
      year: z
        .number({ required_error: 'year is required' })
        .int()
        .min(MIN_YEAR, `year must be between ${MIN_YEAR} and ${MAX_YEAR}`)
        .max(MAX_YEAR, `year must be between ${MIN_YEAR} and ${MAX_YEAR}`),
      coo: z.preprocess(absentAsUndefined, CountryCodeSchema.optional()),
      coa: z.preprocess(absentAsUndefined, CountryCodeSchema.optional()),
      limit: z.preprocess(
        absentAsUndefined,
        z.number().int().positive().default(defaultLimit),
      ),
    })
    .strip()
}

export type GetDemographicsArgs = z.infer<
  ReturnType<typeof buildGetDemographicsArgsSchema>
>

export function buildGetDemographicsInputSchema(
  defaultLimit: number,
): Tool['inputSchema'] {
  return {
    type: 'object',
    properties: {
      year: {
        type: 'integer',
        description: 'Year of data to fetch',
        minimum: MIN_YEAR,
        maximum: MAX_YEAR,
      },
      coo: {
        type: 'string',
        description: 'Country of Origin ISO3 code, e.g. SYR',
        pattern: '^[A-Za-z]{3}$',
      },
      coa: {
        type: 'string',
        description: 'Country of Asylum ISO3 code, e.g. DEU',
        pattern: '^[A-Za-z]{3}$',
      },
      limit: {
        type: 'integer',
        description: 'Max results',
        minimum: 1,
        default: defaultLimit,
      },
    },
    required: ['year'],
    additionalProperties: false,
  }
}
