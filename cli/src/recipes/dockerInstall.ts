import fs from 'fs-extra'
import * as os from 'os'
import type { Recipe } from '../installers/context.js'
import { failedNames, summarizeOutcomes } from '../installers/packageInstaller.js'
import { runChecked } from '../installers/invoker.js'
import { failed, ok, skipped } from '../installers/stepRunner.js'
import { firstLine } from '../installers/utils.js'

export const DOCKER_GPG_URL = 'https://download.docker.com/linux/ubuntu/gpg'
export const KEYRING_DIR = '/etc/apt/keyrings'
export const KEYRING_FILE = `${KEYRING_DIR}/docker.asc`
export const SOURCE_LIST = '/etc/apt/sources.list.d/docker.list'

/** Reads `UBUNTU_CODENAME`, falling back to `VERSION_CODENAME`, from os-release text. */
export function parseCodename(osRelease: string): string | undefined {
  const values = new Map<string, string>()
  for (const line of osRelease.split('\n')) {
    const m = /^([A-Z_]+)=(.*)$/.exec(line.trim())
    if (m) values.set(m[1], m[2].replace(/^["']|["']$/g, ''))
  }
  return values.get('UBUNTU_CODENAME') || values.get('VERSION_CODENAME') || undefined
}

export function dockerSourceLine(arch: string, codename: string): string {
  return `deb [arch=${arch} signed-by=${KEYRING_FILE}] https://download.docker.com/linux/ubuntu ${codename} stable`
}

export function dockerUser(env: NodeJS.ProcessEnv = process.env): string {
  return env.SUDO_USER || env.USER || os.userInfo().username
}

export interface DockerPaths {
  osRelease: string
  keyringFile: string
  sourceList: string
}

export const DEFAULT_DOCKER_PATHS: DockerPaths = {
  osRelease: '/etc/os-release',
  keyringFile: KEYRING_FILE,
  sourceList: SOURCE_LIST
}

export function createDockerInstall(paths: DockerPaths = DEFAULT_DOCKER_PATHS): Recipe {
  return {
    id: 'docker-install',
    title: 'Install Docker',
    requiredTools: ['apt-get', 'dpkg', 'dpkg-query', 'curl', 'install', 'chmod', 'tee', 'getent', 'groupadd', 'usermod'],

    summary: () => [
      'Installs Docker Engine and sets up the docker group.',
      '1. Remove conflicting Docker-related packages',
      '2. Set up the Docker repository and install Docker components',
      '3. Add your user to the docker group',
      '4. Test the Docker installation',
      '5. Optionally reboot to apply group changes',
      '',
      'Requires: curl, build-essential, Ubuntu'
    ],

    steps: (ctx) => [
      {
        name: 'remove-conflicts',
        title: 'Remove conflicting packages',
        fatalOnFailure: false,
        action: async () => {
          const remove = await ctx.decisions.ask('remove_conflicts', 'Remove conflicting Docker-related packages?')
          if (!remove) return skipped('no packages were removed')
          let removed = 0
          for (const spec of ctx.catalog.docker.conflicts) {
            if (await ctx.packages.removeIfPresent(spec)) removed++
          }
          return ok(`${removed} package(s) removed`)
        }
      },
      {
        name: 'docker-key',
        title: 'Set up Docker GPG key',
        fatalOnFailure: true,
        action: async () => {
          const update = await ctx.invoker.invoke('apt-get', ['update'], { sudo: true })
          if (update.exitCode !== 0) ctx.logger.warn(`apt-get update exited with ${update.exitCode}`)
          const prereqs = await ctx.packages.ensureAll(ctx.catalog.docker.prerequisites)
          const bad = failedNames(prereqs)
          if (bad.length) ctx.logger.warn(`Missing prerequisites: ${bad.join(', ')}`)

          await runChecked(ctx.invoker, 'install', ['-m', '0755', '-d', KEYRING_DIR], { sudo: true })
          if (await fs.pathExists(paths.keyringFile)) {
            ctx.logger.info(`${paths.keyringFile} already present`)
          } else {
            const key = await ctx.invoker.invoke('curl', ['-fsSL', DOCKER_GPG_URL, '-o', paths.keyringFile], { sudo: true })
            if (key.exitCode !== 0) return failed('Failed to download Docker GPG key')
          }
          await runChecked(ctx.invoker, 'chmod', ['a+r', paths.keyringFile], { sudo: true })
          return ok('Docker repository key ready')
        }
      },
      {
        name: 'docker-repo',
        title: 'Add Docker repository',
        fatalOnFailure: true,
        action: async () => {
          const arch = firstLine((await runChecked(ctx.invoker, 'dpkg', ['--print-architecture'], { readOnly: true })).output)
          const codename = parseCodename(await fs.readFile(paths.osRelease, 'utf8'))
          if (!arch || !codename) return failed('Could not determine architecture or release codename')

          const line = dockerSourceLine(arch, codename)
          const current = await fs.readFile(paths.sourceList, 'utf8').catch(() => '')
          if (current.trim() === line) {
            ctx.logger.info(`${paths.sourceList} already up to date`)
          } else {
            const res = await ctx.invoker.invoke('tee', [paths.sourceList], { sudo: true, input: `${line}\n` })
            if (res.exitCode !== 0) return failed('Failed to add Docker repository')
          }
          const update = await ctx.invoker.invoke('apt-get', ['update'], { sudo: true })
          return update.exitCode === 0 ? ok(line) : failed('Failed to update package lists')
        }
      },
      {
        name: 'docker-engine',
        title: 'Install Docker Engine',
        fatalOnFailure: true,
        action: async () => {
          const outcomes = await ctx.packages.ensureAll(ctx.catalog.docker.engine)
          const bad = failedNames(outcomes)
          return bad.length ? failed(`Failed to install ${bad.join(', ')}`) : ok(summarizeOutcomes(outcomes))
        }
      },
      {
        name: 'docker-group',
        title: 'Add user to docker group',
        fatalOnFailure: false,
        action: async () => {
          const group = await ctx.invoker.invoke('getent', ['group', 'docker'], { readOnly: true })
          if (group.exitCode === 0) {
            ctx.logger.info('docker group already exists')
          } else {
            const add = await ctx.invoker.invoke('groupadd', ['docker'], { sudo: true })
            if (add.exitCode !== 0) return failed('Failed to create docker group')
          }
          const user = dockerUser()
          if (group.exitCode === 0 && group.output.split(':')[3]?.split(',').map((u) => u.trim()).includes(user)) {
            return skipped(`${user} is already in the docker group`)
          }
          const mod = await ctx.invoker.invoke('usermod', ['-aG', 'docker', user], { sudo: true })
          if (mod.exitCode !== 0) return failed(`Failed to add ${user} to the docker group`)
          return ok(`${user} added; log out and back in (or run 'newgrp docker') to use docker without sudo`)
        }
      },
      {
        name: 'docker-test',
        title: 'Test Docker installation',
        fatalOnFailure: true,
        action: async () => {
          const res = await ctx.invoker.invoke('docker', ['run', '--rm', 'hello-world'], { sudo: true })
          return res.exitCode === 0
            ? ok('Docker is working correctly')
            : failed('Docker is not working correctly. Please check your installation.')
        }
      },
      {
        name: 'reboot',
        title: 'Reboot',
        fatalOnFailure: false,
        action: async () => {
          // --yes never reboots on its own; only an explicit `answers.reboot = true` does.
          if (ctx.options.assumeYes && ctx.decisions.peek('reboot') === undefined) {
            return skipped('please reboot later for the changes to take effect')
          }
          const reboot = await ctx.decisions.ask('reboot', 'Reboot now to apply the group changes?')
          if (!reboot) return skipped('please reboot later for the changes to take effect')
          const res = await ctx.invoker.invoke('reboot', [], { sudo: true })
          return res.exitCode === 0 ? ok('rebooting') : failed(`reboot exited with ${res.exitCode}`)
        }
      }
    ]
  }
}

export const dockerInstall = createDockerInstall()
