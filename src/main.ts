import type { Logger } from 'pino'
import { createCalendarClient } from './lib/calendar.js'
import { loadConfig } from './lib/config.js'
import type { ReminderError } from './lib/errors.js'
import { logger as defaultLogger } from './lib/logger.js'
import { createMailTransport } from './lib/mailer.js'
import { runReminder } from './lib/reminder.js'

export interface MainOptions {
  readonly createCalendarClient?: typeof createCalendarClient
  readonly createMailTransport?: typeof createMailTransport
  readonly now?: Date
  readonly log?: Logger
}

/** 1回分のリマインダー処理を実行し、プロセスの終了コードを返す */
export async function main(env: NodeJS.ProcessEnv = process.env, options: MainOptions = {}): Promise<number> {
  const log = options.log ?? defaultLogger
  const abort = (error: ReminderError): number => {
    log.error({ err: error, kind: error.kind }, error.message)
    return 1
  }

  try {
    // 設定が揃うまではどの外部サービスにも接続しない
    const config = loadConfig(env)
    if (!config.success) return abort(config.error)

    const calendar = (options.createCalendarClient ?? createCalendarClient)(config.value.serviceAccountJson)
    if (!calendar.success) return abort(calendar.error)

    const transport = (options.createMailTransport ?? createMailTransport)(config.value.smtp)

    const result = await runReminder({
      config: config.value,
      calendar: calendar.value,
      transport,
      now: options.now,
      log,
    })
    if (!result.success) return abort(result.error)

    log.info({ ...result.value }, 'Reminder run completed')
    return 0
  } catch (error) {
    log.fatal({ err: error }, 'Error in main execution')
    return 1
  }
}
