import { defineCommand } from 'citty'
import { runProvision } from '../installers/main.js'
import { dockerInstall } from '../recipes/index.js'
import { recipeArgs, toOptions } from './shared.js'

export const dockerInstallCommand = defineCommand({
  meta: {
    name: 'docker-install',
    description: "Install Docker Engine from Docker's APT repository and set up the docker group"
  },
  args: recipeArgs,
  async run({ args }) {
    process.exitCode = await runProvision(dockerInstall, toOptions(args))
  }
})
