import type { Logger } from 'pino'
import { getUpcomingEvents, type CalendarClient } from './calendar.js'
import { isWithinReminderWindow, toUtcDate } from './dates.js'
import { ok, type Result } from './errors.js'
import { logger as defaultLogger } from './logger.js'
import { sendReminder, type MailTransport } from './mailer.js'
import { filterWeekendEvents } from './weekend-filter.js'
import type { ReminderConfig } from '../types/config.js'
import type { ReminderRunSummary } from '../types/events.js'

export interface ReminderDeps {
  readonly config: ReminderConfig
  readonly calendar: CalendarClient
  readonly transport: MailTransport
  readonly now?: Date
  readonly log?: Logger
}

/**
 * 取得 → キーワード/週末フィルタ → 1週間以内か判定 → 送信 を1回だけ実行する
 * 対象イベントが複数あってもメールは1通
 */
export async function runReminder(deps: ReminderDeps): Promise<Result<ReminderRunSummary>> {
  const { config, calendar, transport } = deps
  const now = deps.now ?? new Date()
  const log = deps.log ?? defaultLogger

  const fetched = await getUpcomingEvents(calendar, config.calendarIds, now, log)
  if (!fetched.success) {
    return fetched
  }

  const matched = filterWeekendEvents(fetched.value.events, log)
  const today = toUtcDate(now)
  const upcoming = matched.filter((event) => isWithinReminderWindow(event.date, today))

  const summary = {
    eventsFound: fetched.value.events.length,
    failedCalendars: fetched.value.failedCalendars.length,
    matched: matched.length,
    upcoming: upcoming.length,
  }

  if (upcoming.length === 0) {
    log.info({ ...summary, today }, 'No snowboarding weekend within the next week')
    return ok({ ...summary, sent: false })
  }

  log.info({ ...summary, today, dates: upcoming.map((event) => event.date) }, 'Upcoming snowboarding weekend found')
  const sent = await sendReminder(transport, { from: config.sender, to: config.recipient }, log)
  if (!sent.success) {
    return sent
  }

  return ok({ ...summary, sent: true })
}
