import { describe, it, expect } from 'vitest'
import { genTideId, isTideId } from './id'

describe('genTideId', () => {
  it('使用 unix 秒作为时间段', () => {
    const id = genTideId(new Date('2026-01-02T03:04:05.678Z'))
    expect(id).toMatch(/^tide_1767323045_\d{6}$/)
  })

  it('随机后缀落在 100000-999999', () => {
    for (let i = 0; i < 50; i++) {
      const suffix = Number(genTideId().split('_')[2])
      expect(suffix).toBeGreaterThanOrEqual(100000)
      expect(suffix).toBeLessThanOrEqual(999999)
    }
  })
})

describe('isTideId', () => {
  it('接受生成的 id', () => {
    expect(isTideId(genTideId())).toBe(true)
  })

  it('拒绝路径片段和其它格式', () => {
    expect(isTideId('../etc/passwd')).toBe(false)
    expect(isTideId('tide_123_12345')).toBe(false)
    expect(isTideId('tide_123_123456.json')).toBe(false)
    expect(isTideId('')).toBe(false)
  })
})
