#!/usr/bin/env node
const enableDebugLogs = process.env.DEBUG_LOGS === 'true'

// stdout carries the protocol, so debug output goes to stderr
if (enableDebugLogs) {
  console.log = console.error
  console.info = console.error
  console.warn = console.error
} else {
  console.log = () => {}
  console.info = () => {}
  console.warn = () => {}
}

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'

import { loadConfig } from './config.js'
import { createServer } from './server.js'

// MCP Server Setup
async function main() {
  const config = loadConfig()
  const mcpServer = createServer(config)

  const transport = new StdioServerTransport()
  await mcpServer.connect(transport)
  console.error(`${config.name} MCP server running on stdio`)

  process.on('SIGINT', () => {
    console.error(`Shutting down ${config.name} MCP server...`)
    mcpServer
      .close()
      .catch((error: unknown) => {
        console.error('Error during shutdown:', error)
      })
      .finally(() => process.exit(0))
  })
}

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error)
  process.exit(1)
})
