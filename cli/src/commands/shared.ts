import type { ProvisionOptions } from '../installers/types.js'

export const recipeArgs = {
  yes: { type: 'boolean', alias: 'y', description: 'Non-interactive; answer yes to every prompt' },
  'dry-run': { type: 'boolean', description: 'Print system-changing commands without running them' },
  config: { type: 'string', description: 'Path to a TOML config file (default ~/.config/rigup/config.toml)' }
} as const

export function toOptions(args: { yes?: boolean; 'dry-run'?: boolean; config?: string; 'work-dir'?: string }): ProvisionOptions {
  return {
    dryRun: args['dry-run'] || false,
    assumeYes: args.yes || false,
    configPath: args.config ? String(args.config) : undefined,
    workDir: args['work-dir'] ? String(args['work-dir']) : undefined
  }
}
