import pino from 'pino'
import type { DestinationStream, Logger, LoggerOptions } from 'pino'

// pinoレベル → Cloud Logging severity マッピング
const SEVERITY_MAP: Record<number, string> = {
  10: 'DEBUG',     // trace
  20: 'DEBUG',     // debug
  30: 'INFO',      // info
  40: 'WARNING',   // warn
  50: 'ERROR',     // error
  60: 'CRITICAL',  // fatal
}

/** 出力先を差し替えられるロガーを生成（テストではメモリ上のストリームを渡す） */
export function createLogger(
  destination?: DestinationStream,
  level: string = process.env.LOG_LEVEL || 'info'
): Logger {
  const options: LoggerOptions = {
    level,
    formatters: {
      level(_label, number) {
        return {
          severity: SEVERITY_MAP[number] || 'DEFAULT',
          'severity.text': SEVERITY_MAP[number] || 'DEFAULT',
        }
      },
    },
    // ISO 8601タイムスタンプ
    timestamp: pino.stdTimeFunctions.isoTime,
    // pinoデフォルトの"pid","hostname"を除外
    base: {
      'service.name': process.env.SERVICE_NAME || 'snow-reminder',
      'deployment.environment': process.env.NODE_ENV || 'development',
    },
    messageKey: 'message',
  }
  return pino(options, destination)
}

export const logger: Logger = createLogger()
