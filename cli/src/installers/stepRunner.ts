import type { Logger, RunPhase, RunResult, Step, StepReport, StepResult } from './types.js'
import { errorMessage } from './errors.js'
import { Interrupted } from './invoker.js'

export interface RunStepsOptions {
  logger: Logger
  onPhase?: (phase: RunPhase) => void
}

/**
 * Runs steps strictly in order. A failed fatal step (or an interrupt) ends the
 * run; a failed non-fatal step is reported and the run moves on. Nothing that
 * already happened is undone.
 */
export async function runSteps(steps: readonly Step[], options: RunStepsOptions): Promise<RunResult> {
  const { logger, onPhase } = options
  const reports: StepReport[] = []

  for (const [index, step] of steps.entries()) {
    onPhase?.({ state: 'executing', index, step: step.name })
    logger.info(`Step ${index + 1}/${steps.length}: ${step.title}`)

    let result: StepResult
    try {
      result = await step.action()
    } catch (error) {
      if (error instanceof Interrupted) {
        reports.push({ name: step.name, result: { status: 'failed', reason: error.message } })
        onPhase?.({ state: 'aborted', step: step.name })
        return { status: 'aborted', step: step.name, reason: error.message, reports }
      }
      result = { status: 'failed', reason: errorMessage(error) }
    }
    reports.push({ name: step.name, result })

    if (result.status === 'ok') {
      logger.ok(result.detail ? `${step.title}: ${result.detail}` : `${step.title} done`)
    } else if (result.status === 'skipped') {
      logger.info(`${step.title} skipped: ${result.reason}`)
    } else if (step.fatalOnFailure) {
      logger.err(`${step.title} failed: ${result.reason}`)
      onPhase?.({ state: 'aborted', step: step.name })
      return { status: 'aborted', step: step.name, reason: result.reason, reports }
    } else {
      logger.warn(`${step.title} failed: ${result.reason} (continuing)`)
    }
  }

  onPhase?.({ state: 'completed' })
  return { status: 'completed', reports }
}

export const ok = (detail?: string): StepResult => (detail ? { status: 'ok', detail } : { status: 'ok' })
export const skipped = (reason: string): StepResult => ({ status: 'skipped', reason })
export const failed = (reason: string): StepResult => ({ status: 'failed', reason })
