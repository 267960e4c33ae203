import { defineCommand } from 'citty'
import { runProvision } from '../installers/main.js'
import { prepareSystem } from '../recipes/index.js'
import { recipeArgs, toOptions } from './shared.js'

export const prepareCommand = defineCommand({
  meta: {
    name: 'prepare',
    description: 'Update the system and install essential development tools'
  },
  args: recipeArgs,
  async run({ args }) {
    process.exitCode = await runProvision(prepareSystem, toOptions(args))
  }
})
