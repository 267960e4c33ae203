import fs from 'fs-extra'
import * as path from 'path'
import * as TOML from 'toml'
import type { InstallerKind, PackageCatalog, PackageSpec, ProvisionConfig } from './types.js'
import { ConfigError, errorMessage } from './errors.js'

export const DEFAULT_CONFIG: ProvisionConfig = {
  network: { timeoutSeconds: 1800 },
  opencv: {
    version: '4.x',
    installPrefix: '/usr/local',
    cCompiler: 'gcc-12',
    cxxCompiler: 'g++-12',
    jobs: 0,
    workDir: '.'
  },
  answers: {}
}

export function defaultConfigPath(homeDir: string): string {
  return path.join(homeDir, '.config', 'rigup', 'config.toml')
}

type Table = Record<string, unknown>

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function tableAt(root: Table, key: string, source: string): Table {
  const value = root[key]
  if (value === undefined) return {}
  if (!isTable(value)) throw new ConfigError(source, `[${key}] must be a table`)
  return value
}

function stringAt(table: Table, key: string, fallback: string, source: string): string {
  const value = table[key]
  if (value === undefined) return fallback
  if (typeof value !== 'string' || value.trim() === '') throw new ConfigError(source, `${key} must be a non-empty string`)
  return value
}

function countAt(table: Table, key: string, fallback: number, source: string): number {
  const value = table[key]
  if (value === undefined) return fallback
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(source, `${key} must be a non-negative integer`)
  }
  return value
}

export function parseConfig(raw: string, source: string): ProvisionConfig {
  let data: unknown
  try {
    data = TOML.parse(raw)
  } catch (error) {
    throw new ConfigError(source, errorMessage(error))
  }
  if (!isTable(data)) throw new ConfigError(source, 'expected a table at the top level')

  const network = tableAt(data, 'network', source)
  const opencv = tableAt(data, 'opencv', source)
  const answersTable = tableAt(data, 'answers', source)
  const d = DEFAULT_CONFIG.opencv

  const answers: Record<string, boolean> = {}
  for (const [key, value] of Object.entries(answersTable)) {
    if (typeof value !== 'boolean') throw new ConfigError(source, `answers.${key} must be true or false`)
    answers[key] = value
  }

  return {
    network: { timeoutSeconds: countAt(network, 'timeout_seconds', DEFAULT_CONFIG.network.timeoutSeconds, source) },
    opencv: {
      version: stringAt(opencv, 'version', d.version, source),
      installPrefix: stringAt(opencv, 'install_prefix', d.installPrefix, source),
      cCompiler: stringAt(opencv, 'c_compiler', d.cCompiler, source),
      cxxCompiler: stringAt(opencv, 'cxx_compiler', d.cxxCompiler, source),
      jobs: countAt(opencv, 'jobs', d.jobs, source),
      workDir: stringAt(opencv, 'work_dir', d.workDir, source)
    },
    answers
  }
}

/** A missing file at the default location is fine; an explicit --config must exist. */
export async function loadConfig(configPath: string | undefined, homeDir: string): Promise<ProvisionConfig> {
  const file = configPath ?? defaultConfigPath(homeDir)
  if (!(await fs.pathExists(file))) {
    if (configPath) throw new ConfigError(file, 'file not found')
    return DEFAULT_CONFIG
  }
  return parseConfig(await fs.readFile(file, 'utf8'), file)
}

const KINDS: readonly InstallerKind[] = ['apt', 'snap', 'pip']

function isKind(value: unknown): value is InstallerKind {
  return typeof value === 'string' && KINDS.some((k) => k === value)
}

function toSpec(entry: unknown, source: string): PackageSpec {
  if (typeof entry === 'string') return { name: entry, installer: 'apt', optional: false }
  const name = isTable(entry) ? entry.name : undefined
  if (!isTable(entry) || typeof name !== 'string') {
    throw new ConfigError(source, `package entry ${JSON.stringify(entry)} needs a name`)
  }
  const installer = entry.installer ?? 'apt'
  if (!isKind(installer)) throw new ConfigError(source, `unknown installer for ${name}`)
  return {
    name,
    installer,
    optional: entry.optional === true,
    classic: entry.classic === true,
    noInstallRecommends: entry.noInstallRecommends === true
  }
}

function specList(group: Table, key: string, source: string): PackageSpec[] {
  const list = group[key]
  if (list === undefined) return []
  if (!Array.isArray(list)) throw new ConfigError(source, `${key} must be a list`)
  const seen = new Set<string>()
  const specs: PackageSpec[] = []
  for (const entry of list) {
    const spec = toSpec(entry, source)
    const id = `${spec.installer}:${spec.name}`
    if (seen.has(id)) continue
    seen.add(id)
    specs.push(spec)
  }
  return specs
}

export function parseCatalog(data: unknown, source: string): PackageCatalog {
  if (!isTable(data)) throw new ConfigError(source, 'expected an object')
  const prepare = tableAt(data, 'prepare', source)
  const docker = tableAt(data, 'docker', source)
  const opencv = tableAt(data, 'opencv', source)
  return {
    prepare: { apt: specList(prepare, 'apt', source), snap: specList(prepare, 'snap', source) },
    docker: {
      conflicts: specList(docker, 'conflicts', source),
      prerequisites: specList(docker, 'prerequisites', source),
      engine: specList(docker, 'engine', source)
    },
    opencv: {
      required: specList(opencv, 'required', source),
      optional: specList(opencv, 'optional', source),
      cudaDependencies: specList(opencv, 'cudaDependencies', source)
    }
  }
}

export async function loadCatalog(rootDir: string): Promise<PackageCatalog> {
  const file = path.join(rootDir, 'config', 'packages.json')
  const data: unknown = await fs.readJson(file)
  return parseCatalog(data, file)
}
