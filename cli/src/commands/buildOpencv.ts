import { defineCommand } from 'citty'
import { runProvision } from '../installers/main.js'
import { buildOpencv } from '../recipes/index.js'
import { recipeArgs, toOptions } from './shared.js'

export const buildOpencvCommand = defineCommand({
  meta: {
    name: 'build-opencv',
    description: 'Build OpenCV with opencv_contrib from source, optionally with CUDA'
  },
  args: {
    ...recipeArgs,
    'work-dir': { type: 'string', description: 'Directory for the OpenCV sources and build (default: current directory)' }
  },
  async run({ args }) {
    process.exitCode = await runProvision(buildOpencv, toOptions(args))
  }
})
