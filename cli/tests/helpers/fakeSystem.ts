import { vi } from 'vitest'
import type { InvokeOptions, Logger, PackageCatalog, PromptGate, ProvisionConfig, ProvisionOptions, ToolInvoker, ToolResult } from '../../src/installers/types.js'
import type { ProvisionContext } from '../../src/installers/context.js'
import { Decisions } from '../../src/installers/prompt.js'
import { PackageInstaller } from '../../src/installers/packageInstaller.js'
import { DEFAULT_CONFIG } from '../../src/installers/config.js'

export interface Call {
  cmd: string
  args: string[]
  options: InvokeOptions
}

export type Responder = (cmd: string, args: string[], options: InvokeOptions) => Partial<ToolResult> | undefined

/**
 * In-process stand-in for the host: tracks installed packages so presence
 * checks and installs behave like a real package database.
 */
export class FakeSystem implements ToolInvoker {
  readonly calls: Call[] = []
  readonly installed: Set<string>

  constructor(installed: string[] = [], private readonly respond: Responder = () => undefined) {
    this.installed = new Set(installed)
  }

  async invoke(cmd: string, args: string[], options: InvokeOptions = {}): Promise<ToolResult> {
    this.calls.push({ cmd, args, options })
    const scripted = this.respond(cmd, args, options)
    const base: ToolResult = { exitCode: 0, output: '', signal: null, timedOut: false }
    if (scripted) return { ...base, ...scripted }
    return { ...base, ...this.simulate(cmd, args) }
  }

  private simulate(cmd: string, args: string[]): Partial<ToolResult> {
    const name = args[args.length - 1] ?? ''
    const present = this.installed.has(name)
    if (cmd === 'dpkg-query') {
      return present ? { output: 'install ok installed' } : { exitCode: 1, output: `dpkg-query: no packages found matching ${name}` }
    }
    if ((cmd === 'snap' && args[0] === 'list') || (cmd === 'pip3' && args[0] === 'show')) {
      return present ? {} : { exitCode: 1 }
    }
    if ((cmd === 'apt-get' || cmd === 'snap' || cmd === 'pip3') && args[0] === 'install') {
      this.installed.add(name)
      return {}
    }
    if (cmd === 'apt-get' && args[0] === 'remove') {
      this.installed.delete(name)
      return {}
    }
    return {}
  }

  commandLines(): string[] {
    return this.calls.map((c) => [c.cmd, ...c.args].join(' '))
  }

  mutating(): Call[] {
    return this.calls.filter((c) => !c.options.readOnly)
  }

  installsOf(cmd: string): string[] {
    return this.calls
      .filter((c) => c.cmd === cmd && c.args[0] === 'install' && !c.options.readOnly)
      .map((c) => c.args[c.args.length - 1])
  }
}

export function silentLogger(): Logger {
  return { log: vi.fn(), info: vi.fn(), ok: vi.fn(), warn: vi.fn(), err: vi.fn() }
}

export interface ScriptedGate extends PromptGate {
  questions: string[]
}

export function scriptedGate(answer: boolean | ((question: string) => boolean) = true): ScriptedGate {
  const questions: string[] = []
  return {
    interactive: false,
    questions,
    async confirm(question) {
      questions.push(question)
      return typeof answer === 'function' ? answer(question) : answer
    },
    pause: async () => {},
    close: () => {}
  }
}

export const EMPTY_CATALOG: PackageCatalog = {
  prepare: { apt: [], snap: [] },
  docker: { conflicts: [], prerequisites: [], engine: [] },
  opencv: { required: [], optional: [], cudaDependencies: [] }
}

export interface TestContextInit {
  system?: FakeSystem
  gate?: PromptGate
  answers?: Record<string, boolean>
  catalog?: PackageCatalog
  config?: ProvisionConfig
  options?: Partial<ProvisionOptions>
  cwd?: string
  homeDir?: string
}

export function createTestContext(init: TestContextInit = {}): ProvisionContext & { system: FakeSystem } {
  const system = init.system ?? new FakeSystem()
  const gate = init.gate ?? scriptedGate(true)
  const logger = silentLogger()
  const decisions = new Decisions(gate, init.answers ?? {})
  return {
    cwd: init.cwd ?? '/tmp',
    homeDir: init.homeDir ?? '/tmp',
    rootDir: '/tmp',
    logDir: '/tmp',
    logFile: '/tmp/rigup-test.log',
    options: { dryRun: false, assumeYes: false, configPath: undefined, workDir: undefined, ...init.options },
    config: init.config ?? DEFAULT_CONFIG,
    catalog: init.catalog ?? EMPTY_CATALOG,
    logger,
    invoker: system,
    gate,
    decisions,
    packages: new PackageInstaller(system, decisions, logger),
    system
  }
}
