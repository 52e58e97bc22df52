import { TextContent } from '@modelcontextprotocol/sdk/types.js'

export type ToolContent = TextContent

export type ToolResult = {
  content: ToolContent[]
  isError?: boolean
}

export interface FetchRequestInit {
  headers?: Record<string, string>
  signal?: AbortSignal
}

export interface FetchResponse {
  ok: boolean
  status: number
  statusText: string
  text(): Promise<string>
}

// Structural subset of fetch so node-fetch and test doubles both fit
export type FetchLike = (
  url: string,
  init?: FetchRequestInit,
) => Promise<FetchResponse>
