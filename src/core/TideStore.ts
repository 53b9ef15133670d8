/**
 * TideStore — tide 记录的文件存储
 *
 * 布局：{storageDir}/{id}.json，每条记录一个文件，缩进 JSON
 * - 每次变更整文件覆写，无原子 rename，无锁（单进程单写者）
 * - 文件缺失、不可读或解析失败一律视为不存在
 * - list 全量扫描，跳过损坏/外来文件；扫描本身失败时返回空数组
 */

import fs from 'fs'
import path from 'path'
import { createLogger } from '../logger'
import { genTideId, isTideId } from '../id'
import { getErrorMessage, StorageUnavailableError, ValidationError } from '../errors'
import { computeNextFlow } from './flowSchedule'
import {
  flowEntrySchema,
  tidePatchSchema,
  tideRecordSchema,
  type CreateTideInput,
  type FlowEntry,
  type ListTidesFilter,
  type TidePatch,
  type TideRecord
} from '../types'

const log = createLogger('TideStore')

const RECORD_EXT = '.json'
const STORAGE_REMEDIATION = 'Please configure a writable storage path via TIDES_STORAGE_PATH.'

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

function createdAtMs(record: TideRecord): number {
  const ms = Date.parse(record.createdAt)
  return Number.isNaN(ms) ? 0 : ms
}

export class TideStore {
  private readonly storageDir: string

  constructor(storageDir: string) {
    this.storageDir = storageDir
    this.ensureStorageDir()
  }

  /** 启动时创建目录，失败直接抛出，不推迟到首次写入 */
  private ensureStorageDir(): void {
    try {
      fs.mkdirSync(this.storageDir, { recursive: true })
    } catch (err) {
      if (isErrnoException(err) && (err.code === 'EACCES' || err.code === 'EPERM')) {
        throw new StorageUnavailableError(
          `Permission denied creating storage directory: ${this.storageDir}. ${STORAGE_REMEDIATION}`,
          this.storageDir,
          err
        )
      }
      throw new StorageUnavailableError(
        `Failed to create storage directory: ${this.storageDir}. Error: ${getErrorMessage(err)}. ` +
          STORAGE_REMEDIATION,
        this.storageDir,
        err
      )
    }
  }

  getStorageDir(): string {
    return this.storageDir
  }

  private filePath(id: string): string {
    return path.join(this.storageDir, `${id}${RECORD_EXT}`)
  }

  /** 读取并校验单个文件；缺失、不可读或内容非法都返回 null，不抛出 */
  private readRecord(filePath: string): TideRecord | null {
    let content: string
    try {
      content = fs.readFileSync(filePath, 'utf-8')
    } catch (err) {
      if (!(isErrnoException(err) && err.code === 'ENOENT')) {
        log.warn('Skipping unreadable tide file:', filePath, err)
      }
      return null
    }
    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch {
      log.warn('Skipping unparsable tide file:', filePath)
      return null
    }
    const parsed = tideRecordSchema.safeParse(raw)
    if (!parsed.success) {
      log.warn('Skipping invalid tide file:', filePath, parsed.error.issues[0]?.message ?? '')
      return null
    }
    return parsed.data
  }

  private saveRecord(record: TideRecord): void {
    fs.writeFileSync(this.filePath(record.id), JSON.stringify(record, null, 2), 'utf-8')
  }

  async create(input: CreateTideInput): Promise<TideRecord> {
    const now = new Date()
    const record: TideRecord = {
      id: genTideId(now),
      name: input.name,
      flowType: input.flowType,
      status: 'active',
      createdAt: now.toISOString(),
      lastFlow: null,
      nextFlow: computeNextFlow(input.flowType, now),
      ...(input.description !== undefined && { description: input.description }),
      flowHistory: []
    }
    this.saveRecord(record)
    log.info('Tide created:', record.id, `(${record.flowType})`)
    return record
  }

  async get(id: string): Promise<TideRecord | null> {
    if (!isTideId(id)) return null
    return this.readRecord(this.filePath(id))
  }

  async list(filter: ListTidesFilter = {}): Promise<TideRecord[]> {
    try {
      const entries = fs.readdirSync(this.storageDir, { withFileTypes: true })
      const records: TideRecord[] = []
      for (const entry of entries) {
        if (!entry.isFile() || !entry.name.endsWith(RECORD_EXT)) continue
        const record = this.readRecord(path.join(this.storageDir, entry.name))
        if (!record) continue
        if (filter.flowType && record.flowType !== filter.flowType) continue
        if (filter.activeOnly && record.status !== 'active') continue
        records.push(record)
      }
      return records.sort((a, b) => createdAtMs(b) - createdAtMs(a))
    } catch (err) {
      log.error('Failed to scan storage directory:', this.storageDir, err)
      return []
    }
  }

  /**
   * 浅合并 patch；id 永远保持原值。patch 先经 schema 校验，未知字段抛 ValidationError
   */
  async update(id: string, patch: TidePatch): Promise<TideRecord | null> {
    const parsedPatch = tidePatchSchema.safeParse(patch)
    if (!parsedPatch.success) {
      throw new ValidationError(
        `Invalid tide update: ${parsedPatch.error.issues.map((i) => i.message).join('; ')}`
      )
    }
    const existing = await this.get(id)
    if (!existing) return null

    const { id: _ignoredId, ...fields } = parsedPatch.data
    const defined = Object.fromEntries(
      Object.entries(fields).filter(([, value]) => value !== undefined)
    )
    const merged = tideRecordSchema.safeParse({ ...existing, ...defined, id: existing.id })
    if (!merged.success) {
      throw new ValidationError(
        `Invalid tide update: ${merged.error.issues.map((i) => i.message).join('; ')}`
      )
    }
    this.saveRecord(merged.data)
    return merged.data
  }

  /** 追加会话：更新 lastFlow，并以会话时间重新推算 nextFlow */
  async appendFlow(id: string, entry: FlowEntry): Promise<TideRecord | null> {
    const validEntry = flowEntrySchema.parse(entry)
    const record = await this.get(id)
    if (!record) return null

    record.flowHistory.push(validEntry)
    record.lastFlow = validEntry.timestamp
    const nextFlow = computeNextFlow(record.flowType, validEntry.timestamp)
    if (nextFlow !== null) record.nextFlow = nextFlow

    this.saveRecord(record)
    return record
  }
}
