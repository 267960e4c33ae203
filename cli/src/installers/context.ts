import * as os from 'os'
import * as path from 'path'
import fs from 'fs-extra'
import type { Logger, PackageCatalog, PromptGate, ProvisionConfig, ProvisionOptions, RecipeId, Step, ToolInvoker } from './types.js'
import { Decisions, createPromptGate } from './prompt.js'
import { PackageInstaller } from './packageInstaller.js'
import { createInvoker } from './invoker.js'
import { createLogger } from './logger.js'
import { loadCatalog, loadConfig } from './config.js'
import { createLogPath, findRoot } from './utils.js'

export interface ProvisionContext {
  cwd: string
  homeDir: string
  rootDir: string
  logDir: string
  logFile: string
  options: ProvisionOptions
  config: ProvisionConfig
  catalog: PackageCatalog
  logger: Logger
  invoker: ToolInvoker
  gate: PromptGate
  decisions: Decisions
  packages: PackageInstaller
}

export async function createContext(recipe: RecipeId, options: ProvisionOptions): Promise<ProvisionContext> {
  const homeDir = os.homedir()
  const rootDir = findRoot()
  const logDir = path.join(homeDir, '.local', 'state', 'rigup', 'logs')
  await fs.ensureDir(logDir)
  const logFile = createLogPath(logDir, recipe)

  const config = await loadConfig(options.configPath, homeDir)
  const catalog = await loadCatalog(rootDir)
  const logger = createLogger(logFile)
  const invoker = createInvoker({
    dryRun: options.dryRun,
    logger,
    logFile,
    networkTimeoutMs: config.network.timeoutSeconds > 0 ? config.network.timeoutSeconds * 1000 : undefined
  })
  const gate = createPromptGate({ assumeYes: options.assumeYes })
  const decisions = new Decisions(gate, config.answers)

  return {
    cwd: process.cwd(),
    homeDir,
    rootDir,
    logDir,
    logFile,
    options,
    config,
    catalog,
    logger,
    invoker,
    gate,
    decisions,
    packages: new PackageInstaller(invoker, decisions, logger)
  }
}

export interface Recipe {
  id: RecipeId
  title: string
  /** External tools the recipe shells out to; reported by `doctor`. */
  requiredTools: readonly string[]
  /** Tools only some paths need (CUDA); `doctor` does not count them as missing. */
  optionalTools?: readonly string[]
  summary: (ctx: ProvisionContext) => string[]
  steps: (ctx: ProvisionContext) => Step[]
}
