import type { calendar_v3 } from 'googleapis'

export type CalendarEvent = calendar_v3.Schema$Event

/** 取得元カレンダーIDを付与したイベント */
export interface SourcedEvent {
  readonly calendarId: string
  readonly event: CalendarEvent
}

export interface MatchedEvent {
  readonly calendarId: string
  readonly summary: string
  readonly start: string
  readonly date: string      // YYYY-MM-DD
}

export interface UpcomingEventsResult {
  readonly events: readonly SourcedEvent[]
  readonly failedCalendars: readonly string[]
}

export interface ReminderRunSummary {
  readonly eventsFound: number
  readonly failedCalendars: number
  readonly matched: number
  readonly upcoming: number
  readonly sent: boolean
}
