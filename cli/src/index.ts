import { defineCommand } from 'citty'
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join } from 'path'
import { prepareCommand } from './commands/prepare.js'
import { dockerInstallCommand } from './commands/dockerInstall.js'
import { buildOpencvCommand } from './commands/buildOpencv.js'
import { doctorCommand } from './commands/doctor.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
)

export const root = defineCommand({
  meta: {
    name: 'rigup',
    version: packageJson.version,
    description: 'Provision an Ubuntu workstation: dev packages, Docker, OpenCV from source'
  },
  subCommands: {
    prepare: prepareCommand,
    'docker-install': dockerInstallCommand,
    'build-opencv': buildOpencvCommand,
    doctor: doctorCommand
  }
})
