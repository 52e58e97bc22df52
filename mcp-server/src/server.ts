import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import { ServerConfig } from './config.js'
import { MCPTool, ToolRegistry } from './tools/base.tool.js'
import { GetDemographicsTool } from './tools/get-demographics.tool.js'
import { ToolResult } from './types/base.types.js'

export class MCPServer {
  private server: Server
  private toolRegistry = new ToolRegistry()

  constructor(name: string, version: string) {
    this.server = new Server(
      { name, version },
      {
        capabilities: {
          tools: {},
        },
      },
    )
    this.setupHandlers()
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return this.getTools()
    })

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      return await this.handleToolCall(request)
    })
  }

  getTools() {
    return {
      tools: this.toolRegistry.getAll().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    }
  }

  async handleToolCall(request: {
    params: { name: string; arguments?: unknown }
  }): Promise<ToolResult> {
    const toolName = request.params.name
    const tool = this.toolRegistry.get(toolName)

    if (!tool) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`)
    }

    try {
      return await tool.invoke(request.params.arguments ?? {})
    } catch (err) {
      if (err instanceof z.ZodError) {
        throw new McpError(
          ErrorCode.InvalidParams,
          `Invalid arguments: ${formatZodError(err)}`,
        )
      }
      throw err
    }
  }

  registerTool<T extends object>(tool: MCPTool<T>) {
    this.toolRegistry.register(tool)
  }

  async connect(transport: Transport) {
    await this.server.connect(transport)
  }

  async close() {
    await this.server.close()
  }
}

function formatZodError(err: z.ZodError): string {
  return err.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ')
}

export function createServer(config: ServerConfig): MCPServer {
  const mcpServer = new MCPServer(config.name, config.version)

  mcpServer.registerTool(new GetDemographicsTool(config))

  return mcpServer
}
