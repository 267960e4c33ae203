import * as p from '@clack/prompts'
import type { ProvisionOptions, RunPhase, RunResult } from './types.js'
import { createContext } from './context.js'
import type { ProvisionContext, Recipe } from './context.js'
import { runSteps } from './stepRunner.js'

export interface RecipeRunSummary {
  phase: RunPhase
  result: RunResult | undefined
}

export async function runRecipe(
  recipe: Recipe,
  ctx: ProvisionContext,
  onPhase?: (phase: RunPhase) => void
): Promise<RecipeRunSummary> {
  let phase: RunPhase = { state: 'not-started' }
  const enter = (next: RunPhase) => {
    phase = next
    onPhase?.(next)
  }

  enter({ state: 'prompting' })
  p.note(recipe.summary(ctx).join('\n'), recipe.title)
  const proceed = await ctx.decisions.ask('proceed', 'Do you want to proceed?')
  if (!proceed) {
    ctx.logger.err('Installation aborted.')
    enter({ state: 'declined' })
    return { phase, result: undefined }
  }

  const result = await runSteps(recipe.steps(ctx), { logger: ctx.logger, onPhase: enter })
  if (result.status === 'aborted') {
    ctx.logger.err(`Stopped at '${result.step}': ${result.reason}`)
    if (ctx.gate.interactive) await ctx.gate.pause('Press Enter to exit...')
  }
  return { phase, result }
}

export function exitCodeFor(summary: RecipeRunSummary): number {
  return summary.result?.status === 'completed' ? 0 : 1
}

export async function runProvision(recipe: Recipe, options: ProvisionOptions): Promise<number> {
  const ctx = await createContext(recipe.id, options)
  p.intro(`rigup · ${recipe.title}`)
  if (options.dryRun) ctx.logger.warn('Dry run: system-changing commands are printed, not executed')

  let summary: RecipeRunSummary
  try {
    summary = await runRecipe(recipe, ctx)
  } finally {
    ctx.gate.close()
  }

  if (summary.result?.status === 'completed') {
    p.outro(`${recipe.title} finished. Log: ${ctx.logFile}`)
  } else {
    p.cancel(`${recipe.title} did not complete. Log: ${ctx.logFile}`)
  }
  return exitCodeFor(summary)
}
