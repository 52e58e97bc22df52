import express from 'express'
import cors from 'cors'
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'

import { ServerConfig } from './config.js'
import { createServer } from './server.js'

export function createHttpApp(config: ServerConfig) {
  const app = express()
  app.use(express.json())
  app.use(cors({ origin: '*' }))

  const toolNames = createServer(config)
    .getTools()
    .tools.map((tool) => tool.name)

  // Stateless mode: every request gets its own server and transport
  app.post('/mcp', async (req, res) => {
    const mcpServer = createServer(config)
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    })

    res.on('close', () => {
      transport.close().catch((error: unknown) => {
        console.error('Error closing transport:', error)
      })
      mcpServer.close().catch((error: unknown) => {
        console.error('Error closing MCP server:', error)
      })
    })

    try {
      await mcpServer.connect(transport)
      await transport.handleRequest(req, res, req.body)
    } catch (error) {
      console.error('MCP request error:', error)
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        })
      }
    }
  })

  app.all('/mcp', (_req, res) => {
    res.status(405).json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    })
  })

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      server: config.name,
      transport: 'streamable-http',
      version: config.version,
    })
  })

  app.get('/', (_req, res) => {
    res.json({
      name: 'UNHCR Demographics MCP Server',
      description:
        'MCP server providing access to UNHCR refugee demographic statistics',
      version: config.version,
      endpoints: {
        mcp: '/mcp',
        health: '/health',
      },
      tools: toolNames,
    })
  })

  return app
}
