import { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import { ToolResult } from '../types/base.types.js'

export interface MCPTool<Args extends object = object> {
  name: string
  description: string
  inputSchema: Tool['inputSchema']
  argsSchema: z.ZodType<Args, z.ZodTypeDef, unknown>
  handler: (args: Args) => Promise<ToolResult>
}

export interface StoredMCPTool {
  name: string
  description: string
  inputSchema: Tool['inputSchema']
  // Parses raw arguments with the tool's schema, then runs the handler
  invoke: (rawArgs: unknown) => Promise<ToolResult>
}

export abstract class BaseTool<Args extends object> implements MCPTool<Args> {
  abstract name: string
  abstract description: string
  abstract inputSchema: Tool['inputSchema']
  abstract get argsSchema(): z.ZodType<Args, z.ZodTypeDef, unknown>
  protected abstract toolHandler(args: Args): Promise<ToolResult>

  async handler(args: Args): Promise<ToolResult> {
    try {
      return await this.toolHandler(args)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err)
      console.error(`Tool ${this.name} failed:`, err)
      return this.createErrorResponse(`Unexpected error: ${errorMessage}`)
    }
  }

  protected createErrorResponse(message: string): ToolResult {
    return {
      content: [
        {
          type: 'text' as const,
          text: message,
        },
      ],
      isError: true,
    }
  }

  protected createSuccessResponse(...texts: string[]): ToolResult {
    return {
      content: texts.map((text) => ({
        type: 'text' as const,
        text,
      })),
    }
  }
}

export class ToolRegistry {
  private tools = new Map<string, StoredMCPTool>()

  register<T extends object>(tool: MCPTool<T>): void {
    const storedTool: StoredMCPTool = {
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      invoke: async (rawArgs) =>
        tool.handler(tool.argsSchema.parse(rawArgs)),
    }
    this.tools.set(tool.name, storedTool)
  }

  getAll(): StoredMCPTool[] {
    return Array.from(this.tools.values())
  }

  get(name: string): StoredMCPTool | undefined {
    return this.tools.get(name)
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }
}
