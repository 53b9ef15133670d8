/**
 * Tides 数据模型
 * zod schema 是唯一来源，类型由 schema 推导
 */

import { z } from 'zod'

export const FLOW_TYPES = ['daily', 'weekly', 'project', 'seasonal'] as const
export const TIDE_STATUSES = ['active', 'paused', 'completed'] as const
export const FLOW_INTENSITIES = ['gentle', 'moderate', 'strong'] as const

export const flowTypeSchema = z.enum(FLOW_TYPES)
export const tideStatusSchema = z.enum(TIDE_STATUSES)
export const flowIntensitySchema = z.enum(FLOW_INTENSITIES)

export type FlowType = z.infer<typeof flowTypeSchema>
export type TideStatus = z.infer<typeof tideStatusSchema>
export type FlowIntensity = z.infer<typeof flowIntensitySchema>

/** 一次专注会话（flow） */
export const flowEntrySchema = z.object({
  /** 会话开始时间 ISO-8601 */
  timestamp: z.string(),
  intensity: flowIntensitySchema,
  /** 分钟 */
  duration: z.number().int().nonnegative(),
  notes: z.string().optional()
})

export type FlowEntry = z.infer<typeof flowEntrySchema>

/** 持久化的 tide 记录，文件名 = `${id}.json` */
export const tideRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  flowType: flowTypeSchema,
  status: tideStatusSchema,
  createdAt: z.string(),
  lastFlow: z.string().nullable().default(null),
  nextFlow: z.string().nullable().default(null),
  description: z.string().optional(),
  flowHistory: z.array(flowEntrySchema).default([])
})

export type TideRecord = z.infer<typeof tideRecordSchema>

/**
 * update 的部分字段。id 允许出现但会被忽略，未知字段直接拒绝
 */
export const tidePatchSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    flowType: flowTypeSchema.optional(),
    status: tideStatusSchema.optional(),
    lastFlow: z.string().nullable().optional(),
    nextFlow: z.string().nullable().optional(),
    description: z.string().optional(),
    flowHistory: z.array(flowEntrySchema).optional()
  })
  .strict()

export type TidePatch = z.infer<typeof tidePatchSchema>

export interface CreateTideInput {
  name: string
  flowType: FlowType
  description?: string
}

export interface ListTidesFilter {
  flowType?: FlowType
  activeOnly?: boolean
}

/** list_tides 返回的摘要视图 */
export interface TideSummary {
  id: string
  name: string
  flowType: FlowType
  status: TideStatus
  createdAt: string
  lastFlow: string | null
  nextFlow: string | null
}
