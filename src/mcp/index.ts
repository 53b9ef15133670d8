/**
 * Tides MCP (Model Context Protocol) 服务器
 * 暴露 tide 工作流工具给 Agent 使用，传输层由调用方连接（stdio / 测试用 InMemory）
 *
 * Claude Desktop / Cursor 配置 (mcp.json):
 * {
 *   "mcpServers": {
 *     "tides": {
 *       "command": "npx",
 *       "args": ["tides-mcp"],
 *       "env": { "TIDES_STORAGE_PATH": "${HOME}/Documents/tides_data" }
 *     }
 *   }
 * }
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { TideService } from '../services/tideService'
import { registerTideTools } from './tools/tideTools'

export interface TidesMcpServerOptions {
  name: string
  version: string
}

export function createTidesMcpServer(
  service: TideService,
  options: TidesMcpServerOptions
): McpServer {
  const server = new McpServer(
    { name: options.name, version: options.version },
    { capabilities: { tools: {} } }
  )
  registerTideTools(server, service)
  return server
}
