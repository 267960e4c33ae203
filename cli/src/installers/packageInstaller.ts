import type { InstallOutcome, Logger, PackageSpec, ToolInvoker } from './types.js'
import type { Decisions } from './prompt.js'

export class PackageInstaller {
  constructor(
    private readonly invoker: ToolInvoker,
    private readonly decisions: Decisions,
    private readonly logger: Logger
  ) {}

  async isInstalled(spec: PackageSpec): Promise<boolean> {
    switch (spec.installer) {
      case 'apt': {
        const res = await this.invoker.invoke('dpkg-query', ['-W', '--showformat=${Status}', spec.name], { readOnly: true })
        return res.exitCode === 0 && res.output.includes('install ok installed')
      }
      case 'snap': {
        const res = await this.invoker.invoke('snap', ['list', spec.name], { readOnly: true })
        return res.exitCode === 0
      }
      case 'pip': {
        const res = await this.invoker.invoke('pip3', ['show', spec.name], { readOnly: true })
        return res.exitCode === 0
      }
    }
  }

  async ensureInstalled(spec: PackageSpec): Promise<InstallOutcome> {
    if (await this.isInstalled(spec)) {
      this.logger.info(`[✔] ${spec.name} is already installed`)
      return { kind: 'already-present', name: spec.name }
    }

    if (spec.optional) {
      const accepted = await this.decisions.ask(`install:${spec.name}`, `Do you want to install ${spec.name}?`)
      if (!accepted) {
        this.logger.info(`Skipping ${spec.name}`)
        return { kind: 'skipped', name: spec.name, reason: 'user-declined' }
      }
    }

    this.logger.info(`[↓] Installing ${spec.name}...`)
    const res = await this.install(spec)
    if (res.exitCode === 0) {
      this.logger.ok(`${spec.name} installed`)
      return { kind: 'installed', name: spec.name }
    }
    const reason = res.timedOut ? 'timed out' : `exit code ${res.exitCode}`
    this.logger.err(`Failed to install ${spec.name} (${reason})`)
    return { kind: 'failed', name: spec.name, reason, exitCode: res.exitCode }
  }

  /** Installs in order and never stops on a failed package. */
  async ensureAll(specs: readonly PackageSpec[]): Promise<InstallOutcome[]> {
    const outcomes: InstallOutcome[] = []
    for (const spec of specs) outcomes.push(await this.ensureInstalled(spec))
    return outcomes
  }

  async removeIfPresent(spec: PackageSpec): Promise<boolean> {
    if (!(await this.isInstalled(spec))) return false
    this.logger.info(`Removing ${spec.name}`)
    const res = await this.invoker.invoke('apt-get', ['remove', '-y', spec.name], { sudo: true })
    if (res.exitCode !== 0) this.logger.warn(`Could not remove ${spec.name} (exit code ${res.exitCode})`)
    return res.exitCode === 0
  }

  private install(spec: PackageSpec) {
    switch (spec.installer) {
      case 'apt':
        return this.invoker.invoke(
          'apt-get',
          ['install', '-y', ...(spec.noInstallRecommends ? ['--no-install-recommends'] : []), spec.name],
          { sudo: true }
        )
      case 'snap':
        return this.invoker.invoke('snap', ['install', ...(spec.classic ? ['--classic'] : []), spec.name], { sudo: true })
      case 'pip':
        return this.invoker.invoke('pip3', ['install', spec.name])
    }
  }
}

export function summarizeOutcomes(outcomes: readonly InstallOutcome[]): string {
  const count = (kind: InstallOutcome['kind']) => outcomes.filter((o) => o.kind === kind).length
  return `${count('installed')} installed, ${count('already-present')} already present, ${count('skipped')} skipped, ${count('failed')} failed`
}

export function failedNames(outcomes: readonly InstallOutcome[]): string[] {
  return outcomes.filter((o) => o.kind === 'failed').map((o) => o.name)
}
