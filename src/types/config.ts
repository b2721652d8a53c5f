export interface SmtpConfig {
  readonly host: string
  readonly port: number
  readonly user: string
  readonly password: string
}

export interface ReminderConfig {
  readonly serviceAccountJson: string
  readonly calendarIds: readonly string[]
  readonly smtp: SmtpConfig
  readonly sender: string
  readonly recipient: string
}
