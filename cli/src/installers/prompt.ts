import * as p from '@clack/prompts'
import { createInterface } from 'node:readline'
import type { PromptGate } from './types.js'

const ACCEPT = new Set(['y', 'yes'])

/** Only an explicit y/yes accepts; anything else, including no answer, declines. */
export function isAffirmative(answer: string | undefined | null): boolean {
  if (answer === undefined || answer === null) return false
  return ACCEPT.has(answer.trim().toLowerCase())
}

export function createAssumeYesGate(): PromptGate {
  return {
    interactive: false,
    confirm: async () => true,
    pause: async () => {},
    close: () => {}
  }
}

export function createClackGate(): PromptGate {
  return {
    interactive: true,
    async confirm(question) {
      const answer = await p.confirm({ message: question, initialValue: false })
      if (p.isCancel(answer)) return false
      return answer
    },
    async pause(message) {
      await p.text({ message, placeholder: 'Enter' })
    },
    close: () => {}
  }
}

// Piped stdin: one line per question, read through a single interface so
// buffered lines are not lost between questions.
export function createLineGate(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): PromptGate {
  let lines: AsyncIterator<string> | undefined
  let closeInterface = () => {}
  const nextLine = async (): Promise<string | undefined> => {
    if (!lines) {
      const rl = createInterface({ input, terminal: false })
      closeInterface = () => rl.close()
      lines = rl[Symbol.asyncIterator]()
    }
    const next = await lines.next()
    return next.done ? undefined : next.value
  }
  return {
    interactive: false,
    async confirm(question) {
      output.write(`${question} (y/n): `)
      const answer = await nextLine()
      output.write('\n')
      return isAffirmative(answer)
    },
    async pause(message) {
      output.write(`${message}\n`)
      await nextLine()
    },
    close: () => closeInterface()
  }
}

export function createPromptGate(options: { assumeYes: boolean }): PromptGate {
  if (options.assumeYes) return createAssumeYesGate()
  if (process.stdin.isTTY && process.stdout.isTTY) return createClackGate()
  return createLineGate(process.stdin, process.stdout)
}

/**
 * Keyed yes/no answers for one run. Preset answers (from the config file)
 * win over the gate; everything else is asked once and remembered.
 */
export class Decisions {
  private readonly answers = new Map<string, boolean>()

  constructor(
    private readonly gate: PromptGate,
    preset: Record<string, boolean> = {}
  ) {
    for (const [key, value] of Object.entries(preset)) this.answers.set(key, value)
  }

  async ask(key: string, question: string): Promise<boolean> {
    const known = this.answers.get(key)
    if (known !== undefined) return known
    const answer = await this.gate.confirm(question)
    this.answers.set(key, answer)
    return answer
  }

  peek(key: string): boolean | undefined {
    return this.answers.get(key)
  }
}
