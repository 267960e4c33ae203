import * as p from '@clack/prompts'
import fs from 'fs-extra'
import type { Logger } from './types.js'

type Level = 'log' | 'info' | 'ok' | 'warn' | 'err'

export function createLogger(logFile?: string): Logger {
  const write = (level: Level, msg: string) => {
    if (!logFile) return
    fs.appendFileSync(logFile, `${new Date().toISOString()} ${level.toUpperCase().padEnd(4)} ${msg}\n`)
  }
  return {
    log: (msg) => { p.log.message(msg); write('log', msg) },
    info: (msg) => { p.log.info(msg); write('info', msg) },
    ok: (msg) => { p.log.success(msg); write('ok', msg) },
    warn: (msg) => { p.log.warn(msg); write('warn', msg) },
    err: (msg) => { p.log.error(msg); write('err', msg) }
  }
}
