import type { Logger } from 'pino'
import { logger as defaultLogger } from './logger.js'
import { getStartValue, isWeekend, resolveStartDate } from './dates.js'
import type { MatchedEvent, SourcedEvent } from '../types/events.js'

export const KEYWORDS: readonly string[] = ['snowboarding', 'snow', 'board', 'snow trip']

/** タイトルにキーワードのいずれかを含むか（大文字小文字を区別しない） */
export function matchesKeyword(title: string): boolean {
  const normalized = title.toLowerCase()
  return KEYWORDS.some((keyword) => normalized.includes(keyword))
}

/** キーワードに一致し、かつ土日に開始するイベントだけを残す */
export function filterWeekendEvents(
  events: readonly SourcedEvent[],
  log: Logger = defaultLogger
): MatchedEvent[] {
  const matched: MatchedEvent[] = []

  for (const { calendarId, event } of events) {
    const summary = event.summary ?? ''
    if (!matchesKeyword(summary)) continue

    const start = getStartValue(event.start)
    if (!start) continue
    const date = resolveStartDate(start)
    if (!date) {
      log.warn({ calendarId, summary, start }, 'Skipping event with unparseable start')
      continue
    }
    if (!isWeekend(date)) continue

    matched.push({ calendarId, summary, start, date })
    log.info({ calendarId, summary, start, date }, `Found snowboarding event: ${summary} on ${start}`)
  }

  return matched
}
