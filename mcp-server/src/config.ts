import fetch from 'node-fetch'
import { z } from 'zod'

import { FetchLike } from './types/base.types.js'

export const DEFAULT_API_BASE_URL =
  'https://api.unhcr.org/population/v1/demographics/'
export const DEFAULT_REQUEST_TIMEOUT_MS = 10000
export const DEFAULT_LIMIT = 100

export interface ServerConfig {
  name: string
  version: string
  apiBaseUrl: string
  requestTimeoutMs: number
  defaultLimit: number
  fetch: FetchLike
}

const EnvSchema = z.object({
  UNHCR_API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
  UNHCR_API_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
})

export const nodeFetch: FetchLike = (url, init) => fetch(url, init)

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ServerConfig> = {},
): ServerConfig {
  const parsed = EnvSchema.safeParse(env)

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${details}`)
  }

  return {
    name: 'unhcr-demographics',
    version: '0.1.0',
    apiBaseUrl: parsed.data.UNHCR_API_BASE_URL,
    requestTimeoutMs: parsed.data.UNHCR_API_TIMEOUT_MS,
    defaultLimit: DEFAULT_LIMIT,
    fetch: nodeFetch,
    ...overrides,
  }
}
