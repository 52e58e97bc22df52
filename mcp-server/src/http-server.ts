#!/usr/bin/env node
import dotenv from 'dotenv'

// Load environment variables
dotenv.config()

const enableDebugLogs = process.env.DEBUG_LOGS === 'true'

if (!enableDebugLogs) {
  console.log = () => {}
  console.info = () => {}
  console.warn = () => {}
}

import { loadConfig } from './config.js'
import { createHttpApp } from './http-app.js'

const config = loadConfig()
const app = createHttpApp(config)

const PORT = Number(process.env.PORT) || 3000
app.listen(PORT, () => {
  console.error(
    `${config.name} MCP Streamable HTTP Server started on port ${PORT}`,
  )
  console.error(`MCP endpoint: http://localhost:${PORT}/mcp`)
  console.error(`Health check: http://localhost:${PORT}/health`)
})

// Error handling
process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason)
})

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error)
  process.exit(1)
})
