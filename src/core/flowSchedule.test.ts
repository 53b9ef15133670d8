import { describe, it, expect } from 'vitest'
import { computeNextFlow } from './flowSchedule'

describe('computeNextFlow', () => {
  const t = '2026-03-01T09:30:00.000Z'

  it('daily 加 1 天', () => {
    expect(computeNextFlow('daily', t)).toBe('2026-03-02T09:30:00.000Z')
  })

  it('weekly 加 7 天', () => {
    expect(computeNextFlow('weekly', t)).toBe('2026-03-08T09:30:00.000Z')
  })

  it('seasonal 加 90 天', () => {
    expect(computeNextFlow('seasonal', t)).toBe('2026-05-30T09:30:00.000Z')
  })

  it('project 不排期', () => {
    expect(computeNextFlow('project', t)).toBeNull()
  })

  it('接受 Date 作为基准', () => {
    expect(computeNextFlow('daily', new Date(t))).toBe('2026-03-02T09:30:00.000Z')
  })

  it('非法时间抛出 RangeError', () => {
    expect(() => computeNextFlow('daily', 'not-a-date')).toThrow(RangeError)
  })
})
