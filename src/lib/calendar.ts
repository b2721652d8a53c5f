import { google, type calendar_v3 } from 'googleapis'
import type { Logger } from 'pino'
import { z } from 'zod'
import { errorMessage, fail, isRecoverable, ok, type Result } from './errors.js'
import { logger as defaultLogger } from './logger.js'
import type { CalendarEvent, SourcedEvent, UpcomingEventsResult } from '../types/events.js'

export const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar.readonly']
export const MAX_RESULTS_PER_CALENDAR = 50

/** events.list だけを使う Calendar API クライアント（テストではフェイクを渡す） */
export interface CalendarClient {
  readonly events: {
    list(params: calendar_v3.Params$Resource$Events$List): Promise<{ data: calendar_v3.Schema$Events }>
  }
}

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
  project_id: z.string().optional(),
})

/** サービスアカウントのJSONから読み取り専用の Calendar クライアントを生成する */
export function createCalendarClient(serviceAccountJson: string): Result<CalendarClient> {
  let payload: unknown
  try {
    payload = JSON.parse(serviceAccountJson)
  } catch (error) {
    return fail('init', `Failed to initialize Google Calendar API: ${errorMessage(error)}`, error)
  }

  const parsed = serviceAccountSchema.safeParse(payload)
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')
    return fail('init', `Failed to initialize Google Calendar API: invalid service account (${fields})`, parsed.error)
  }

  try {
    const auth = new google.auth.GoogleAuth({
      credentials: {
        client_email: parsed.data.client_email,
        private_key: parsed.data.private_key,
      },
      projectId: parsed.data.project_id,
      scopes: CALENDAR_SCOPES,
    })
    return ok(google.calendar({ version: 'v3', auth }))
  } catch (error) {
    return fail('init', `Failed to initialize Google Calendar API: ${errorMessage(error)}`, error)
  }
}

/** 1つのカレンダーから now 以降のイベントを最大50件、開始時刻順に取得する */
export async function fetchCalendarEvents(
  client: CalendarClient,
  calendarId: string,
  now: Date
): Promise<Result<CalendarEvent[]>> {
  try {
    const response = await client.events.list({
      calendarId,
      timeMin: now.toISOString(),
      maxResults: MAX_RESULTS_PER_CALENDAR,
      singleEvents: true,
      orderBy: 'startTime',
    })
    return ok(response.data.items ?? [])
  } catch (error) {
    return fail('fetch', `Error fetching events from calendar ${calendarId}: ${errorMessage(error)}`, error)
  }
}

/** 全カレンダーを順番に取得する（1つ失敗しても残りは続行） */
export async function getUpcomingEvents(
  client: CalendarClient,
  calendarIds: readonly string[],
  now: Date,
  log: Logger = defaultLogger
): Promise<Result<UpcomingEventsResult>> {
  const events: SourcedEvent[] = []
  const failedCalendars: string[] = []

  for (const calendarId of calendarIds) {
    const result = await fetchCalendarEvents(client, calendarId, now)
    if (!result.success) {
      if (!isRecoverable(result.error)) {
        return result
      }
      log.error({ err: result.error, calendarId }, result.error.message)
      failedCalendars.push(calendarId)
      continue
    }

    log.info({ calendarId, count: result.value.length }, `Found ${result.value.length} events in calendar ${calendarId}`)
    for (const event of result.value) {
      events.push({ calendarId, event })
    }
  }

  return ok({ events, failedCalendars })
}
