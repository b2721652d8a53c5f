import { createTransport, type SendMailOptions } from 'nodemailer'
import type { Logger } from 'pino'
import { errorMessage, fail, ok, type Result } from './errors.js'
import { logger as defaultLogger } from './logger.js'
import type { SmtpConfig } from '../types/config.js'

export const REMINDER_SUBJECT = 'Snowboarding Parking Reminder'
export const REMINDER_BODY = 'Reminder to get parking for the upcoming snowboarding weekend.'

/** sendMail だけを使う SMTP トランスポート（テストではフェイクを渡す） */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string }>
}

export interface ReminderAddress {
  readonly from: string
  readonly to: string
}

/** 平文で接続し STARTTLS で必ず暗号化してから認証する */
export function createMailTransport(smtp: SmtpConfig): MailTransport {
  return createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: false,
    requireTLS: true,
    auth: {
      user: smtp.user,
      pass: smtp.password,
    },
  })
}

export function buildReminderMail(address: ReminderAddress): SendMailOptions {
  return {
    from: address.from,
    to: address.to,
    subject: REMINDER_SUBJECT,
    text: REMINDER_BODY,
  }
}

/** 固定文面のリマインダーを送信し messageId を返す */
export async function sendReminder(
  transport: MailTransport,
  address: ReminderAddress,
  log: Logger = defaultLogger
): Promise<Result<string>> {
  try {
    const info = await transport.sendMail(buildReminderMail(address))
    log.info({ messageId: info.messageId, to: address.to }, 'Reminder email sent successfully')
    return ok(info.messageId)
  } catch (error) {
    // ログ出力は呼び出し側（main）で1回だけ行う
    return fail('send', `Failed to send email reminder: ${errorMessage(error)}`, error)
  }
}
