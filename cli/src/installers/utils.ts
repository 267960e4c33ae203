import { which } from 'zx'
import fs from 'fs-extra'
import { accessSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join, resolve } from 'path'

export async function needCmd(cmd: string): Promise<boolean> {
  try {
    await which(cmd)
    return true
  } catch {
    return false
  }
}

export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].map((a) => (a.includes(' ') || a === '' ? `"${a}"` : a)).join(' ')
}

// Walk up from the compiled or source location until config/packages.json is found.
export function findRoot(): string {
  const here = dirname(fileURLToPath(import.meta.url))
  let cur = here
  for (let i = 0; i < 6; i++) {
    try {
      accessSync(resolve(cur, 'config', 'packages.json'))
      return cur
    } catch {
      cur = resolve(cur, '..')
    }
  }
  return resolve(here, '..', '..')
}

export function createLogPath(logDir: string, recipe: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, -5)
  return join(logDir, `${recipe}-${timestamp}.log`)
}

export async function isNonEmptyDir(path: string): Promise<boolean> {
  const stat = await fs.stat(path).catch(() => null)
  if (!stat?.isDirectory()) return false
  return (await fs.readdir(path)).length > 0
}

export function firstLine(text: string): string {
  return text.split('\n').map((l) => l.trim()).find((l) => l.length > 0) ?? ''
}
