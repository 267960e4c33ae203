import { spawn } from 'node:child_process'
import fs from 'fs-extra'
import type { InvokeOptions, Logger, ToolInvoker, ToolResult } from './types.js'
import { ProvisionError, ToolFailure } from './errors.js'
import { formatCommand } from './utils.js'

// zx `$` is fine for fixed one-liners; every dynamic cmd + args here goes
// through spawn so arguments are never re-parsed by a shell.

const OUTPUT_LIMIT = 64 * 1024
const NETWORK_COMMANDS = new Set(['apt-get', 'snap', 'pip3', 'wget', 'curl'])

export class Interrupted extends ProvisionError {
  constructor(public readonly signal: NodeJS.Signals) {
    super(`Interrupted by ${signal}`)
    this.name = 'Interrupted'
  }
}

export interface SpawnOptions {
  cwd?: string
  input?: string
  timeoutMs?: number
  echo: boolean
}

export interface SpawnedResult extends ToolResult {
  interruptedBy: NodeJS.Signals | null
}

export function spawnTool(cmd: string, args: string[], options: SpawnOptions): Promise<SpawnedResult> {
  return new Promise((resolve) => {
    let output = ''
    let timedOut = false
    let interruptedBy: NodeJS.Signals | null = null
    let settled = false

    const child = spawn(cmd, args, {
      cwd: options.cwd || process.cwd(),
      shell: false,
      stdio: [options.input === undefined ? 'inherit' : 'pipe', 'pipe', 'pipe']
    })

    const collect = (chunk: Buffer, sink: NodeJS.WriteStream) => {
      const text = chunk.toString()
      if (options.echo) sink.write(text)
      output = (output + text).slice(-OUTPUT_LIMIT)
    }
    child.stdout?.on('data', (chunk: Buffer) => collect(chunk, process.stdout))
    child.stderr?.on('data', (chunk: Buffer) => collect(chunk, process.stderr))

    const forward = (signal: NodeJS.Signals) => () => {
      interruptedBy = signal
      child.kill(signal)
    }
    const onSigint = forward('SIGINT')
    const onSigterm = forward('SIGTERM')
    process.on('SIGINT', onSigint)
    process.on('SIGTERM', onSigterm)

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true
          child.kill('SIGTERM')
        }, options.timeoutMs)
      : undefined

    const finish = (exitCode: number, signal: NodeJS.Signals | null) => {
      if (settled) return
      settled = true
      if (timer) clearTimeout(timer)
      process.off('SIGINT', onSigint)
      process.off('SIGTERM', onSigterm)
      resolve({ exitCode, output, signal, timedOut, interruptedBy })
    }

    child.on('error', (error: NodeJS.ErrnoException) => {
      output += error.message
      finish(error.code === 'ENOENT' ? 127 : 1, null)
    })
    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      finish(code ?? (timedOut ? 124 : 1), signal)
    })

    if (options.input !== undefined) child.stdin?.end(options.input)
  })
}

export interface InvokerOptions {
  dryRun: boolean
  logger: Logger
  logFile?: string
  networkTimeoutMs?: number
  isRoot?: boolean
}

export function createInvoker(options: InvokerOptions): ToolInvoker {
  const isRoot = options.isRoot ?? process.getuid?.() === 0

  return {
    async invoke(cmd: string, args: string[], opts: InvokeOptions = {}): Promise<ToolResult> {
      const [bin, argv]: [string, string[]] = opts.sudo && !isRoot ? ['sudo', [cmd, ...args]] : [cmd, args]
      const display = formatCommand(bin, argv)

      if (options.dryRun && !opts.readOnly) {
        options.logger.log(`[dry-run] ${display}`)
        return { exitCode: 0, output: '', signal: null, timedOut: false }
      }

      const timeoutMs = opts.timeoutMs ?? (NETWORK_COMMANDS.has(cmd) ? options.networkTimeoutMs : undefined)
      const { interruptedBy, ...result } = await spawnTool(bin, argv, {
        cwd: opts.cwd,
        input: opts.input,
        timeoutMs,
        echo: !opts.readOnly
      })

      if (options.logFile) {
        await fs.appendFile(options.logFile, `$ ${display}\n${result.output}${result.output.endsWith('\n') ? '' : '\n'}[exit ${result.exitCode}]\n`)
      }
      if (interruptedBy) throw new Interrupted(interruptedBy)
      if (result.timedOut) options.logger.warn(`Timed out after ${Math.round((timeoutMs ?? 0) / 1000)}s: ${display}`)
      return result
    }
  }
}

export async function runChecked(
  invoker: ToolInvoker,
  cmd: string,
  args: string[],
  options: InvokeOptions = {}
): Promise<ToolResult> {
  const result = await invoker.invoke(cmd, args, options)
  if (result.exitCode !== 0) {
    throw new ToolFailure(formatCommand(cmd, args), result.exitCode, result.output)
  }
  return result
}
