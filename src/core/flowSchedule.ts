/**
 * 下一次 flow 时间推算
 * 创建时以创建时间为基准，追加会话时以会话开始时间为基准；project 不自动排期
 */

import type { FlowType } from '../types'

const DAY_MS = 24 * 60 * 60 * 1000

export const FLOW_INTERVAL_DAYS: Readonly<Partial<Record<FlowType, number>>> = {
  daily: 1,
  weekly: 7,
  seasonal: 90
}

export function computeNextFlow(flowType: FlowType, reference: Date | string): string | null {
  const days = FLOW_INTERVAL_DAYS[flowType]
  if (days === undefined) return null
  const base = typeof reference === 'string' ? new Date(reference) : reference
  if (Number.isNaN(base.getTime())) {
    throw new RangeError(`Invalid flow reference time: ${String(reference)}`)
  }
  return new Date(base.getTime() + days * DAY_MS).toISOString()
}
