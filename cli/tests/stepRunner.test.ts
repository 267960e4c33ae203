import { describe, it, expect, vi } from 'vitest'
import type { RunPhase, Step } from '../src/installers/types.js'
import { runSteps, ok, failed, skipped } from '../src/installers/stepRunner.js'
import { Interrupted } from '../src/installers/invoker.js'
import { silentLogger } from './helpers/fakeSystem.js'

function step(name: string, fatalOnFailure: boolean, action: Step['action']): Step {
  return { name, title: name, fatalOnFailure, action }
}

describe('runSteps', () => {
  it('runs every step in order and completes', async () => {
    const order: string[] = []
    const steps = ['a', 'b', 'c'].map((n) => step(n, true, async () => { order.push(n); return ok() }))

    const result = await runSteps(steps, { logger: silentLogger() })

    expect(order).toEqual(['a', 'b', 'c'])
    expect(result.status).toBe('completed')
    expect(result.reports.map((r) => r.name)).toEqual(['a', 'b', 'c'])
  })

  it('stops at a failed fatal step before anything after it runs', async () => {
    const after = vi.fn(async () => ok())
    const steps = [
      step('configure', true, async () => failed('cmake exited with 1')),
      step('compile', true, after)
    ]

    const result = await runSteps(steps, { logger: silentLogger() })

    expect(result).toEqual({
      status: 'aborted',
      step: 'configure',
      reason: 'cmake exited with 1',
      reports: [{ name: 'configure', result: { status: 'failed', reason: 'cmake exited with 1' } }]
    })
    expect(after).not.toHaveBeenCalled()
  })

  it('continues past a failed non-fatal step', async () => {
    const logger = silentLogger()
    const last = vi.fn(async () => ok())
    const steps = [
      step('packages', false, async () => failed('could not install gdb')),
      step('skip-me', false, async () => skipped('already done')),
      step('last', true, last)
    ]

    const result = await runSteps(steps, { logger })

    expect(result.status).toBe('completed')
    expect(last).toHaveBeenCalledTimes(1)
    expect(logger.warn).toHaveBeenCalledWith('packages failed: could not install gdb (continuing)')
  })

  it('treats a thrown error as a step failure', async () => {
    const result = await runSteps([step('boom', true, async () => { throw new Error('kaput') })], { logger: silentLogger() })
    expect(result).toMatchObject({ status: 'aborted', step: 'boom', reason: 'kaput' })
  })

  it('aborts on an interrupt even when the step is non-fatal', async () => {
    const next = vi.fn(async () => ok())
    const steps = [
      step('compile', false, async () => { throw new Interrupted('SIGINT') }),
      step('install', false, next)
    ]

    const result = await runSteps(steps, { logger: silentLogger() })

    expect(result).toMatchObject({ status: 'aborted', step: 'compile', reason: 'Interrupted by SIGINT' })
    expect(next).not.toHaveBeenCalled()
  })

  it('reports each phase it passes through', async () => {
    const phases: RunPhase[] = []
    await runSteps(
      [step('a', false, async () => ok()), step('b', false, async () => ok())],
      { logger: silentLogger(), onPhase: (p) => phases.push(p) }
    )
    expect(phases).toEqual([
      { state: 'executing', index: 0, step: 'a' },
      { state: 'executing', index: 1, step: 'b' },
      { state: 'completed' }
    ])
  })
})
