import { z } from 'zod'
import { fail, ok, type Result } from './errors.js'
import type { ReminderConfig } from '../types/config.js'

export const REQUIRED_ENV_VARS = [
  'GOOGLE_SERVICE_ACCOUNT',
  'SMTP_SERVER',
  'SMTP_PORT',
  'EMAIL_USER',
  'EMAIL_PASSWORD',
  'EMAIL_RECIPIENT',
  'PRIMARY_CALENDAR_ID',
  'SECONDARY_CALENDAR_ID',
] as const

export type RequiredEnvVar = (typeof REQUIRED_ENV_VARS)[number]

// 10進数の数字のみ（16進数・指数表記・前後の空白は不可）
const smtpPortSchema = z.string().regex(/^\d+$/).pipe(z.coerce.number().int().min(1).max(65535))

/**
 * 環境変数から設定を読み込む
 * 未設定（空文字を含む）の変数があれば最初の1つを名指しした config エラーを返す
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<ReminderConfig> {
  const missing = REQUIRED_ENV_VARS.find((name) => !env[name])
  if (missing) {
    return fail('config', `Missing required environment variable: ${missing}`)
  }
  const read = (name: RequiredEnvVar): string => env[name] ?? ''

  const port = smtpPortSchema.safeParse(read('SMTP_PORT'))
  if (!port.success) {
    return fail('config', `Invalid SMTP_PORT: ${read('SMTP_PORT')}`, port.error)
  }

  return ok(
    Object.freeze({
      serviceAccountJson: read('GOOGLE_SERVICE_ACCOUNT'),
      calendarIds: Object.freeze([read('PRIMARY_CALENDAR_ID'), read('SECONDARY_CALENDAR_ID')]),
      smtp: Object.freeze({
        host: read('SMTP_SERVER'),
        port: port.data,
        user: read('EMAIL_USER'),
        password: read('EMAIL_PASSWORD'),
      }),
      sender: read('EMAIL_USER'),
      recipient: read('EMAIL_RECIPIENT'),
    })
  )
}
