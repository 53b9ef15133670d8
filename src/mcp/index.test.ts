import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import path from 'path'
import os from 'os'
import { z } from 'zod'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js'
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { TideStore } from '../core/TideStore'
import { TideService } from '../services/tideService'
import { createTidesMcpServer } from './index'
import { TIDE_TOOL_NAMES } from './tools/tideTools'

const createdSchema = z.object({ success: z.literal(true), id: z.string() })

describe('Tides MCP server', () => {
  let tempDir: string
  let server: McpServer
  let client: Client

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tides-mcp-test-'))
    const service = new TideService(new TideStore(tempDir))
    server = createTidesMcpServer(service, { name: 'tides', version: '0.1.0' })
    client = new Client({ name: 'tides-test', version: '0.0.0' })
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)])
  })

  afterEach(async () => {
    await client.close()
    await server.close()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  async function call(name: string, args: Record<string, unknown>) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }))
    const first = result.content[0]
    if (first?.type !== 'text') throw new Error(`Unexpected content for ${name}`)
    const data: unknown = JSON.parse(first.text)
    return { isError: result.isError === true, data }
  }

  it('注册四个 tide 工具', async () => {
    const { tools } = await client.listTools()
    expect(tools.map((t) => t.name).sort()).toEqual([...TIDE_TOOL_NAMES].sort())
    const create = tools.find((t) => t.name === 'create_tide')
    expect(create?.description).toBe('Create a new tidal workflow for rhythmic productivity')
    expect(create?.inputSchema.required).toEqual(['name', 'flowType'])
  })

  it('create → flow → list → end 全流程', async () => {
    const created = await call('create_tide', { name: 'Morning', flowType: 'daily' })
    expect(created.isError).toBe(false)
    const { id } = createdSchema.parse(created.data)

    const flowed = await call('flow_tide', { id, intensity: 'strong', duration: 10 })
    expect(flowed.isError).toBe(false)
    expect(flowed.data).toMatchObject({ success: true, id, nextActions: expect.any(Array) })

    const listed = await call('list_tides', { activeOnly: true })
    expect(listed.data).toMatchObject({ total: 1, summaries: [{ id, name: 'Morning' }] })

    const ended = await call('end_tide', { id, notes: 'done for today' })
    expect(ended.data).toMatchObject({ success: true, id, finalStatus: 'completed' })

    const afterEnd = await call('list_tides', { activeOnly: true })
    expect(afterEnd.data).toEqual({ summaries: [], total: 0 })
  })

  it('flow_tide 使用默认强度和时长', async () => {
    const created = await call('create_tide', { name: 'Project X', flowType: 'project' })
    const { id } = createdSchema.parse(created.data)
    await call('flow_tide', { id })

    const stored = JSON.parse(fs.readFileSync(path.join(tempDir, `${id}.json`), 'utf-8'))
    expect(stored.flowHistory).toHaveLength(1)
    expect(stored.flowHistory[0]).toMatchObject({ intensity: 'moderate', duration: 25 })
  })

  it('业务失败以 isError 返回', async () => {
    const result = await call('end_tide', { id: 'tide_1700000000_123456' })
    expect(result.isError).toBe(true)
    expect(result.data).toEqual({
      success: false,
      id: 'tide_1700000000_123456',
      finalStatus: 'not_found',
      completionTime: '',
      summary: 'Tide not found'
    })
  })

  it('非法参数不进入核心逻辑', async () => {
    const rejected = await client
      .callTool({ name: 'create_tide', arguments: { name: 'Bad', flowType: 'hourly' } })
      .then(
        (res) => CallToolResultSchema.parse(res).isError === true,
        () => true
      )
    expect(rejected).toBe(true)
    expect(fs.readdirSync(tempDir)).toEqual([])
  })

  it('未知工具名被拒绝', async () => {
    const rejected = await client
      .callTool({ name: 'delete_tide', arguments: {} })
      .then(
        (res) => CallToolResultSchema.parse(res).isError === true,
        () => true
      )
    expect(rejected).toBe(true)
  })
})
