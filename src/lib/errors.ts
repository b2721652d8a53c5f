/**
 * 実行結果とエラー種別
 * fetch はカレンダー単位で握りつぶしてよい、それ以外は実行を中断する
 */
export type ReminderErrorKind = 'config' | 'init' | 'fetch' | 'send'

export class ReminderError extends Error {
  readonly kind: ReminderErrorKind

  constructor(kind: ReminderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ReminderError'
    this.kind = kind
  }
}

export type Result<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: ReminderError }

export function ok<T>(value: T): Result<T> {
  return { success: true, value }
}

export function fail<T = never>(kind: ReminderErrorKind, message: string, cause?: unknown): Result<T> {
  return { success: false, error: new ReminderError(kind, message, cause === undefined ? undefined : { cause }) }
}

export function isRecoverable(error: ReminderError): boolean {
  return error.kind === 'fetch'
}

/** unknown な例外からメッセージを取り出す */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
