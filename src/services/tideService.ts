/**
 * TideService — tide 工作流操作（create / list / flow / end）
 * MCP 工具层调用；所有内部错误都转换为 success=false 的结果，不向外抛出
 */

import { createLogger } from '../logger'
import { getErrorMessage } from '../errors'
import type { TideStore } from '../core/TideStore'
import type {
  FlowEntry,
  FlowIntensity,
  FlowType,
  TideRecord,
  TideSummary
} from '../types'

const log = createLogger('TideService')

export const DEFAULT_FLOW_INTENSITY: FlowIntensity = 'moderate'
export const DEFAULT_FLOW_DURATION = 25

export const FLOW_GUIDANCE: Readonly<Record<FlowIntensity, string>> = {
  gentle:
    '🌊 Begin with calm, steady focus. Let thoughts flow naturally without forcing. Take breaks as needed.',
  moderate:
    '🌊 Maintain focused attention with deliberate action. Balance effort with ease. Stay present to the work.',
  strong:
    '🌊 Dive deep with sustained concentration. Channel energy into meaningful progress. Push through resistance mindfully.'
}

export const FLOW_NEXT_ACTIONS: readonly string[] = [
  '🎯 Set clear intention for this flow session',
  '⏰ Start timer and begin focused work',
  '🧘 Take mindful breaks if needed',
  '📝 Capture insights and progress',
  '🌊 Honor the natural rhythm of the work'
]

export type EndTideStatus = 'completed' | 'paused'

function endSummary(status: EndTideStatus, name: string, flowCount: number): string {
  switch (status) {
    case 'completed':
      return `🌊 Tide '${name}' completed successfully with ${flowCount} flow sessions. The natural rhythm has reached its conclusion.`
    case 'paused':
      return `🌊 Tide '${name}' paused gracefully with ${flowCount} flow sessions. The flow can resume when energy returns.`
  }
}

// ─── 结果类型 ───

export interface CreateTideResult {
  success: boolean
  id: string
  name: string
  flowType: FlowType
  createdAt: string
  nextFlow: string | null
}

export interface ListTidesResult {
  summaries: TideSummary[]
  total: number
}

export interface FlowTideResult {
  success: boolean
  id: string
  startedAt: string
  estimatedCompletion: string
  guidance: string
  nextActions: string[]
}

export interface EndTideResult {
  success: boolean
  id: string
  finalStatus: string
  completionTime: string
  summary: string
}

// ─── 参数类型 ───

export interface CreateTideArgs {
  name: string
  flowType: FlowType
  description?: string
}

export interface ListTidesArgs {
  flowType?: FlowType
  activeOnly?: boolean
}

export interface FlowTideArgs {
  id: string
  intensity?: FlowIntensity
  duration?: number
}

export interface EndTideArgs {
  id: string
  status?: EndTideStatus
  notes?: string
}

export function toTideSummary(tide: TideRecord): TideSummary {
  return {
    id: tide.id,
    name: tide.name,
    flowType: tide.flowType,
    status: tide.status,
    createdAt: tide.createdAt,
    lastFlow: tide.lastFlow,
    nextFlow: tide.nextFlow
  }
}

export class TideService {
  constructor(private readonly store: TideStore) {}

  async createTide(args: CreateTideArgs): Promise<CreateTideResult> {
    try {
      const tide = await this.store.create({
        name: args.name,
        flowType: args.flowType,
        description: args.description
      })
      log.info(`Creating tide: ${tide.name} (${tide.flowType})`)
      return {
        success: true,
        id: tide.id,
        name: tide.name,
        flowType: tide.flowType,
        createdAt: tide.createdAt,
        nextFlow: tide.nextFlow
      }
    } catch (err) {
      log.error('Failed to create tide:', err)
      return {
        success: false,
        id: '',
        name: args.name,
        flowType: args.flowType,
        createdAt: new Date().toISOString(),
        nextFlow: null
      }
    }
  }

  async listTides(args: ListTidesArgs = {}): Promise<ListTidesResult> {
    try {
      const tides = await this.store.list({
        flowType: args.flowType,
        activeOnly: args.activeOnly
      })
      const summaries = tides.map(toTideSummary)
      return { summaries, total: summaries.length }
    } catch (err) {
      log.error('Failed to list tides:', err)
      return { summaries: [], total: 0 }
    }
  }

  /** 开始一次 flow 会话，记录立即写入历史 */
  async flowTide(args: FlowTideArgs): Promise<FlowTideResult> {
    const intensity = args.intensity ?? DEFAULT_FLOW_INTENSITY
    const duration = args.duration ?? DEFAULT_FLOW_DURATION
    try {
      const tide = await this.store.get(args.id)
      if (!tide) {
        return {
          success: false,
          id: args.id,
          startedAt: '',
          estimatedCompletion: '',
          guidance: 'Tide not found',
          nextActions: []
        }
      }

      const now = new Date()
      const startedAt = now.toISOString()
      const estimatedCompletion = new Date(now.getTime() + duration * 60_000).toISOString()
      const entry: FlowEntry = { timestamp: startedAt, intensity, duration }
      await this.store.appendFlow(tide.id, entry)

      log.info(`Starting flow session for tide: ${tide.id} (${intensity} intensity, ${duration}min)`)
      return {
        success: true,
        id: tide.id,
        startedAt,
        estimatedCompletion,
        guidance: FLOW_GUIDANCE[intensity],
        nextActions: [...FLOW_NEXT_ACTIONS]
      }
    } catch (err) {
      log.error('Failed to start flow:', err)
      return {
        success: false,
        id: args.id,
        startedAt: '',
        estimatedCompletion: '',
        guidance: 'Failed to start flow session',
        nextActions: []
      }
    }
  }

  /**
   * 结束 tide（completed / paused）。已结束的 tide 再次结束返回失败，不做修改。
   * notes 写到最后一条会话上；没有会话时补一条 0 分钟的 gentle 会话承载 notes
   */
  async endTide(args: EndTideArgs): Promise<EndTideResult> {
    const status = args.status ?? 'completed'
    try {
      const tide = await this.store.get(args.id)
      if (!tide) {
        return {
          success: false,
          id: args.id,
          finalStatus: 'not_found',
          completionTime: '',
          summary: 'Tide not found'
        }
      }

      if (tide.status === 'completed' || tide.status === 'paused') {
        return {
          success: false,
          id: tide.id,
          finalStatus: tide.status,
          completionTime: tide.createdAt,
          summary: `Tide is already ${tide.status}`
        }
      }

      // 会话数取结束前的历史，不含下面补录的会话
      const flowCount = tide.flowHistory.length
      const completionTime = new Date().toISOString()
      let flowHistory: FlowEntry[] | undefined

      if (args.notes) {
        const last = tide.flowHistory[tide.flowHistory.length - 1]
        if (last) {
          flowHistory = [...tide.flowHistory.slice(0, -1), { ...last, notes: args.notes }]
        } else {
          await this.store.appendFlow(tide.id, {
            timestamp: completionTime,
            intensity: 'gentle',
            duration: 0,
            notes: args.notes
          })
        }
      }

      const updated = await this.store.update(tide.id, {
        status,
        lastFlow: completionTime,
        ...(flowHistory && { flowHistory })
      })
      if (!updated) {
        throw new Error(`Tide disappeared while ending: ${tide.id}`)
      }

      log.info(`Ended tide: ${tide.id} with status ${status}`)
      return {
        success: true,
        id: tide.id,
        finalStatus: status,
        completionTime,
        summary: endSummary(status, tide.name, flowCount)
      }
    } catch (err) {
      log.error('Failed to end tide:', err)
      return {
        success: false,
        id: args.id,
        finalStatus: 'error',
        completionTime: '',
        summary: `Failed to end tide: ${getErrorMessage(err)}`
      }
    }
  }
}
