import fs from 'fs-extra'
import * as path from 'path'
import type { Recipe } from '../installers/context.js'
import { failedNames, summarizeOutcomes } from '../installers/packageInstaller.js'
import { failed, ok, skipped } from '../installers/stepRunner.js'

export const OH_MY_BASH_INSTALLER = 'https://raw.githubusercontent.com/ohmybash/oh-my-bash/master/tools/install.sh'

export const prepareSystem: Recipe = {
  id: 'prepare-system',
  title: 'Prepare system',
  requiredTools: ['apt-get', 'dpkg-query', 'snap', 'curl', 'bash'],

  summary: (ctx) => [
    'Installs essential development tools and dependencies.',
    '1. Update package lists and upgrade the system',
    '2. Install development tools and libraries (APT)',
    '3. Install Snap packages',
    '4. Install Oh My Bash',
    '',
    'Packages:',
    ...[...ctx.catalog.prepare.apt, ...ctx.catalog.prepare.snap].map((s) => `  - ${s.name}`),
    '  - oh-my-bash'
  ],

  steps: (ctx) => [
    {
      name: 'update',
      title: 'Update package lists',
      fatalOnFailure: false,
      action: async () => {
        const res = await ctx.invoker.invoke('apt-get', ['update'], { sudo: true })
        return res.exitCode === 0 ? ok() : failed(`apt-get update exited with ${res.exitCode}`)
      }
    },
    {
      name: 'upgrade',
      title: 'Upgrade installed packages',
      fatalOnFailure: false,
      action: async () => {
        const res = await ctx.invoker.invoke('apt-get', ['upgrade', '-y'], { sudo: true })
        return res.exitCode === 0 ? ok() : failed(`apt-get upgrade exited with ${res.exitCode}`)
      }
    },
    {
      name: 'apt-packages',
      title: 'Install development packages',
      fatalOnFailure: false,
      action: async () => {
        const outcomes = await ctx.packages.ensureAll(ctx.catalog.prepare.apt)
        const bad = failedNames(outcomes)
        return bad.length ? failed(`could not install ${bad.join(', ')}`) : ok(summarizeOutcomes(outcomes))
      }
    },
    {
      name: 'snap-packages',
      title: 'Install Snap packages',
      fatalOnFailure: false,
      action: async () => {
        const outcomes = await ctx.packages.ensureAll(ctx.catalog.prepare.snap)
        const bad = failedNames(outcomes)
        return bad.length ? failed(`could not install ${bad.join(', ')}`) : ok(summarizeOutcomes(outcomes))
      }
    },
    {
      name: 'oh-my-bash',
      title: 'Install Oh My Bash',
      fatalOnFailure: false,
      action: async () => {
        if (await fs.pathExists(path.join(ctx.homeDir, '.oh-my-bash'))) {
          return skipped('Oh My Bash is already installed')
        }
        const script = await ctx.invoker.invoke('curl', ['-fsSL', OH_MY_BASH_INSTALLER], { readOnly: true })
        if (script.exitCode !== 0) return failed(`could not download the installer (exit ${script.exitCode})`)
        const res = await ctx.invoker.invoke('bash', ['-c', script.output])
        return res.exitCode === 0 ? ok('Oh My Bash installed') : failed(`installer exited with ${res.exitCode}`)
      }
    }
  ]
}
