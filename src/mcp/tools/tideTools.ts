/**
 * MCP tide tools (create / list / flow / end)
 */

import { z } from 'zod'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { flowIntensitySchema, flowTypeSchema } from '../../types'
import {
  DEFAULT_FLOW_DURATION,
  DEFAULT_FLOW_INTENSITY,
  type TideService
} from '../../services/tideService'

export const TIDE_TOOL_NAMES = ['create_tide', 'list_tides', 'flow_tide', 'end_tide'] as const

function toolResult(result: object, isError = false) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
    ...(isError && { isError: true })
  }
}

export function registerTideTools(server: McpServer, service: TideService): void {
  server.registerTool(
    'create_tide',
    {
      description: 'Create a new tidal workflow for rhythmic productivity',
      inputSchema: z.object({
        name: z.string().min(1).describe('Name of the tidal workflow'),
        flowType: flowTypeSchema.describe(
          'Type of tidal flow: daily, weekly, project (no automatic schedule) or seasonal'
        ),
        description: z.string().optional().describe('Description of the workflow')
      })
    },
    async ({ name, flowType, description }) => {
      const result = await service.createTide({ name, flowType, description })
      return toolResult(result, !result.success)
    }
  )

  server.registerTool(
    'list_tides',
    {
      description: 'List all tidal workflows with their current status',
      inputSchema: z.object({
        flowType: flowTypeSchema.optional().describe('Filter by flow type'),
        activeOnly: z.boolean().optional().describe('Show only active tides')
      })
    },
    async ({ flowType, activeOnly }) => {
      const result = await service.listTides({ flowType, activeOnly })
      return toolResult(result)
    }
  )

  server.registerTool(
    'flow_tide',
    {
      description: 'Start a flow session for a specific tidal workflow',
      inputSchema: z.object({
        id: z.string().describe('ID of the tide to flow (from list_tides)'),
        intensity: flowIntensitySchema
          .default(DEFAULT_FLOW_INTENSITY)
          .describe('Flow intensity'),
        duration: z
          .number()
          .int()
          .nonnegative()
          .default(DEFAULT_FLOW_DURATION)
          .describe('Flow duration in minutes')
      })
    },
    async ({ id, intensity, duration }) => {
      const result = await service.flowTide({ id, intensity, duration })
      return toolResult(result, !result.success)
    }
  )

  server.registerTool(
    'end_tide',
    {
      description: 'End a tidal workflow by completing or pausing it',
      inputSchema: z.object({
        id: z.string().describe('ID of the tide to end'),
        status: z
          .enum(['completed', 'paused'])
          .default('completed')
          .describe('How to end the tide'),
        notes: z.string().optional().describe('Optional notes about ending the tide')
      })
    },
    async ({ id, status, notes }) => {
      const result = await service.endTide({ id, status, notes })
      return toolResult(result, !result.success)
    }
  )
}
