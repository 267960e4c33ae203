import { defineCommand } from 'citty'
import * as p from '@clack/prompts'
import { needCmd } from '../installers/utils.js'
import { RECIPES } from '../recipes/index.js'

export async function checkTools(tools: readonly string[]): Promise<Array<[string, boolean]>> {
  const results: Array<[string, boolean]> = []
  for (const tool of tools) results.push([tool, await needCmd(tool)])
  return results
}

export function reportLines(required: Array<[string, boolean]>, optional: Array<[string, boolean]> = []): string[] {
  return [
    ...required.map(([tool, found]) => `${found ? '✓' : '✗'} ${tool}`),
    ...optional.map(([tool, found]) => `${found ? '✓' : '·'} ${tool} (optional)`)
  ]
}

export const doctorCommand = defineCommand({
  meta: { name: 'doctor', description: 'Check which external tools each recipe needs' },
  async run() {
    p.intro('rigup · doctor')
    for (const recipe of Object.values(RECIPES)) {
      const required = await checkTools(recipe.requiredTools)
      const optional = await checkTools(recipe.optionalTools ?? [])
      p.note(reportLines(required, optional).join('\n'), recipe.title)
    }
    if (process.getuid?.() !== 0 && !(await needCmd('sudo'))) {
      p.log.warn('sudo not found and not running as root; package installation will fail')
    }
    p.outro('Done')
  }
})
