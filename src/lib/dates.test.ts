import { describe, it, expect } from '@jest/globals'
import {
  daysUntil,
  getStartValue,
  isWeekend,
  isWithinReminderWindow,
  parseDate,
  parseStartDateTime,
  resolveStartDate,
  toUtcDate,
} from './dates.js'

describe('parseDate', () => {
  it('should accept a valid calendar date', () => {
    expect(parseDate('2026-10-24')).toBe('2026-10-24')
  })

  it.each(['2026-02-30', '2026-13-01', '24/10/2026', '2026-10-24T10:00:00Z', ''])(
    'should reject %s',
    (value) => {
      expect(parseDate(value)).toBeNull()
    }
  )
})

describe('parseStartDateTime', () => {
  it('should parse a Z suffix to the same instant as +00:00', () => {
    const zulu = parseStartDateTime('2026-10-24T09:30:00Z')
    const offset = parseStartDateTime('2026-10-24T09:30:00+00:00')

    expect(zulu?.instant.getTime()).toBe(offset?.instant.getTime())
    expect(zulu?.instant.toISOString()).toBe('2026-10-24T09:30:00.000Z')
    expect(zulu?.date).toBe('2026-10-24')
  })

  it('should keep the calendar date of the event offset', () => {
    // UTC では土曜 04:00 だが、イベント自身の日付は金曜
    const parsed = parseStartDateTime('2026-10-23T20:00:00-08:00')

    expect(parsed?.date).toBe('2026-10-23')
    expect(parsed?.instant.toISOString()).toBe('2026-10-24T04:00:00.000Z')
  })

  it('should accept fractional seconds and minute precision', () => {
    expect(parseStartDateTime('2026-10-24T09:30:00.250+09:00')?.date).toBe('2026-10-24')
    expect(parseStartDateTime('2026-10-24T09:30-07:00')?.date).toBe('2026-10-24')
  })

  it.each(['2026-10-24T09:30:00', 'not-a-date', '2026-02-30T10:00:00Z'])('should reject %s', (value) => {
    expect(parseStartDateTime(value)).toBeNull()
  })
})

describe('getStartValue', () => {
  it('should prefer the date-only field', () => {
    expect(getStartValue({ date: '2026-10-24', dateTime: '2026-10-24T09:00:00Z' })).toBe('2026-10-24')
  })

  it('should fall back to dateTime when date is empty', () => {
    expect(getStartValue({ date: '', dateTime: '2026-10-24T09:00:00Z' })).toBe('2026-10-24T09:00:00Z')
  })

  it('should return undefined when neither field is present', () => {
    expect(getStartValue({})).toBeUndefined()
    expect(getStartValue({ date: null, dateTime: null })).toBeUndefined()
    expect(getStartValue(undefined)).toBeUndefined()
  })
})

describe('resolveStartDate', () => {
  it('should resolve date-only and date-time values', () => {
    expect(resolveStartDate('2026-10-25')).toBe('2026-10-25')
    expect(resolveStartDate('2026-10-25T07:00:00Z')).toBe('2026-10-25')
  })

  it('should return null for unparseable values', () => {
    expect(resolveStartDate('tomorrow')).toBeNull()
    expect(resolveStartDate('2026-10-25Tmorning')).toBeNull()
  })
})

describe('isWeekend', () => {
  it.each([
    ['2026-10-24', true],   // 土
    ['2026-10-25', true],   // 日
    ['2026-10-23', false],  // 金
    ['2026-10-21', false],  // 水
    ['2026-10-26', false],  // 月
  ])('%s -> %s', (date, expected) => {
    expect(isWeekend(date)).toBe(expected)
  })
})

describe('toUtcDate', () => {
  it('should use the UTC calendar date', () => {
    expect(toUtcDate(new Date('2026-10-21T23:30:00-08:00'))).toBe('2026-10-22')
    expect(toUtcDate(new Date('2026-10-21T00:00:00Z'))).toBe('2026-10-21')
  })
})

describe('daysUntil', () => {
  it('should count whole days between dates', () => {
    expect(daysUntil('2026-10-24', '2026-10-21')).toBe(3)
    expect(daysUntil('2026-11-01', '2026-10-28')).toBe(4)
    expect(daysUntil('2026-10-20', '2026-10-21')).toBe(-1)
  })
})

describe('isWithinReminderWindow', () => {
  const today = '2026-10-21'

  it.each([
    ['2026-10-20', false],  // -1
    ['2026-10-21', true],   // 0
    ['2026-10-24', true],   // 3
    ['2026-10-27', true],   // 6
    ['2026-10-28', false],  // 7
    ['2026-10-31', false],  // 10
  ])('%s -> %s', (date, expected) => {
    expect(isWithinReminderWindow(date, today)).toBe(expected)
  })
})
