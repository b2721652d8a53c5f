import type { CalendarEvent } from '../types/events.js'

const MS_PER_DAY = 24 * 60 * 60 * 1000
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const DATE_TIME_PATTERN = /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?[+-]\d{2}:\d{2}$/

// 今日から6日後まで（1週間）
export const REMINDER_WINDOW_DAYS = 7

export interface ParsedDateTime {
  readonly instant: Date
  readonly date: string      // イベント自身のオフセットでの日付
}

/** YYYY-MM-DD を検証して返す。存在しない日付は null */
export function parseDate(value: string): string | null {
  const match = DATE_PATTERN.exec(value)
  if (!match) return null
  const [, year, month, day] = match
  const utc = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
  return utc.toISOString().slice(0, 10) === value ? value : null
}

/** 末尾の Z を +00:00 に正規化してから日時をパースする */
export function parseStartDateTime(value: string): ParsedDateTime | null {
  const normalized = value.replace(/[zZ]$/, '+00:00')
  const match = DATE_TIME_PATTERN.exec(normalized)
  if (!match) return null
  const date = parseDate(match[1])
  const instant = new Date(normalized)
  if (!date || Number.isNaN(instant.getTime())) return null
  return { instant, date }
}

/** 終日イベントは start.date、時刻指定イベントは start.dateTime を使う */
export function getStartValue(start: CalendarEvent['start']): string | undefined {
  return start?.date || start?.dateTime || undefined
}

/** 開始値から日付を求める。パースできなければ null */
export function resolveStartDate(value: string): string | null {
  if (value.includes('T')) {
    return parseStartDateTime(value)?.date ?? null
  }
  return parseDate(value)
}

function toEpochDay(date: string): number {
  return Math.floor(Date.parse(`${date}T00:00:00Z`) / MS_PER_DAY)
}

/** 0 = 日曜 ... 6 = 土曜 */
export function dayOfWeek(date: string): number {
  return new Date(`${date}T00:00:00Z`).getUTCDay()
}

export function isWeekend(date: string): boolean {
  const day = dayOfWeek(date)
  return day === 0 || day === 6
}

export function toUtcDate(now: Date): string {
  return now.toISOString().slice(0, 10)
}

/** date - today の日数 */
export function daysUntil(date: string, today: string): number {
  return toEpochDay(date) - toEpochDay(today)
}

export function isWithinReminderWindow(date: string, today: string): boolean {
  const days = daysUntil(date, today)
  return days >= 0 && days < REMINDER_WINDOW_DAYS
}
