/**
 * Tide ID 生成：tide_<unix 秒>_<6 位随机数>
 * 碰撞概率可忽略，不做去重
 */

import { randomInt } from 'node:crypto'

const TIDE_ID_PATTERN = /^tide_\d+_\d{6}$/

export function genTideId(now: Date = new Date()): string {
  const seconds = Math.floor(now.getTime() / 1000)
  return `tide_${seconds}_${randomInt(100000, 1000000)}`
}

/** id 同时用作文件名，不符合格式的一律视为不存在 */
export function isTideId(value: string): boolean {
  return TIDE_ID_PATTERN.test(value)
}
