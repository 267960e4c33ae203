import { describe, it, expect, beforeEach, afterAll } from 'vitest'
import { existsSync, mkdirSync, writeFileSync, promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { runRecipe } from '../src/installers/main.js'
import { buildOpencv, opencvLayout } from '../src/recipes/buildOpencv.js'
import { FakeSystem, createTestContext, scriptedGate } from './helpers/fakeSystem.js'
import type { Responder } from './helpers/fakeSystem.js'

const root = join(tmpdir(), `rigup-test-${Date.now()}-opencv`)
let workDir: string
let seq = 0

beforeEach(async () => {
  workDir = join(root, `run-${seq++}`)
  await fs.mkdir(workDir, { recursive: true })
})
afterAll(async () => { await fs.rm(root, { recursive: true, force: true }) })

const noCuda = { enable_cuda: false, enable_ffmpeg: false, install_opencv: false }

async function populateSources() {
  const layout = opencvLayout(workDir, '4.x')
  await fs.mkdir(join(layout.sourceDir, 'modules'), { recursive: true })
  await fs.mkdir(join(layout.contribDir, 'modules'), { recursive: true })
  return layout
}

function context(system: FakeSystem, answers: Record<string, boolean> = noCuda) {
  return createTestContext({ system, answers, options: { workDir } })
}

describe('build-opencv recipe', () => {
  it('skips download and extraction when the sources are already there', async () => {
    const layout = await populateSources()
    const system = new FakeSystem()

    const summary = await runRecipe(buildOpencv, context(system))

    expect(summary.result?.status).toBe('completed')
    expect(system.calls.filter((c) => c.cmd === 'wget' || c.cmd === 'unzip')).toHaveLength(0)
    const cmake = system.calls.find((c) => c.cmd === 'cmake')
    expect(cmake?.options.cwd).toBe(layout.buildDir)
    expect(cmake?.args).toContain('WITH_CUDA=OFF')
    expect(cmake?.args).toContain(`OPENCV_EXTRA_MODULES_PATH=${join(layout.contribDir, 'modules')}`)
    expect(system.calls.some((c) => c.cmd === 'make' && c.args[0].startsWith('-j'))).toBe(true)
  })

  it('never touches CUDA tooling when CUDA is declined', async () => {
    await populateSources()
    const system = new FakeSystem()

    await runRecipe(buildOpencv, context(system))

    expect(system.calls.some((c) => c.cmd === 'nvidia-smi' || c.cmd === 'nvcc')).toBe(false)
  })

  it('stops after a failed cmake configure without compiling', async () => {
    await populateSources()
    const system = new FakeSystem([], (cmd) => (cmd === 'cmake' ? { exitCode: 1 } : undefined))

    const summary = await runRecipe(buildOpencv, context(system))

    expect(summary.result).toMatchObject({
      status: 'aborted',
      step: 'configure',
      reason: 'CMake configuration failed. Please check the output for details.'
    })
    expect(system.calls.some((c) => c.cmd === 'make')).toBe(false)
  })

  it('downloads and extracts both archives into an empty work directory', async () => {
    const layout = opencvLayout(workDir, '4.x')
    const extract: Responder = (cmd, args) => {
      if (cmd !== 'unzip') return undefined
      mkdirSync(args[1].endsWith('opencv_contrib.zip') ? layout.contribDir : layout.sourceDir, { recursive: true })
      return {}
    }
    const system = new FakeSystem([], extract)

    const summary = await runRecipe(buildOpencv, context(system))

    expect(summary.result?.status).toBe('completed')
    expect(system.calls.filter((c) => c.cmd === 'wget' || c.cmd === 'unzip').map((c) => [c.cmd, ...c.args].join(' '))).toEqual([
      `wget -O ${join(workDir, 'opencv.zip')} https://github.com/opencv/opencv/archive/4.x.zip`,
      `wget -O ${join(workDir, 'opencv_contrib.zip')} https://github.com/opencv/opencv_contrib/archive/4.x.zip`,
      `unzip -q ${join(workDir, 'opencv.zip')}`,
      `unzip -q ${join(workDir, 'opencv_contrib.zip')}`
    ])
  })

  it('aborts with a missing-resource error when the sources never appear', async () => {
    const system = new FakeSystem()

    const summary = await runRecipe(buildOpencv, context(system))

    expect(summary.result).toMatchObject({ status: 'aborted', step: 'configure' })
    expect(summary.result?.status === 'aborted' && summary.result.reason).toBe(
      `${opencvLayout(workDir, '4.x').sourceDir} does not exist. Please ensure it is downloaded and extracted.`
    )
  })

  it('passes the detected compute capability to cmake when CUDA is enabled', async () => {
    await populateSources()
    const system = new FakeSystem([], (cmd, args) =>
      cmd === 'nvidia-smi' && args[0] === '--query-gpu=compute_cap' ? { output: '8.6\n' } : undefined
    )

    await runRecipe(buildOpencv, context(system, {
      enable_cuda: true,
      check_cuda: false,
      install_cuda_deps: false,
      enable_ffmpeg: true,
      install_opencv: false
    }))

    const args = system.calls.find((c) => c.cmd === 'cmake')?.args ?? []
    expect(args).toContain('WITH_CUDA=ON')
    expect(args).toContain('CUDA_ARCH_BIN=8.6')
    expect(args).toContain('WITH_FFMPEG=ON')
  })

  it('skips configure and compile when the build directory already has a Makefile', async () => {
    const layout = await populateSources()
    await fs.mkdir(layout.buildDir, { recursive: true })
    await fs.writeFile(join(layout.buildDir, 'Makefile'), 'all:\n', 'utf8')
    const system = new FakeSystem()

    const summary = await runRecipe(buildOpencv, context(system))

    const status = (name: string) => summary.result?.reports.find((r) => r.name === name)?.result.status
    expect(status('configure')).toBe('skipped')
    expect(status('compile')).toBe('skipped')
    expect(system.calls.some((c) => c.cmd === 'cmake' || c.cmd === 'make')).toBe(false)
  })

  it('leaves WITH_FFMPEG to OpenCV and never asks about it without CUDA', async () => {
    await populateSources()
    const system = new FakeSystem()
    const gate = scriptedGate(true)
    const ctx = createTestContext({ system, gate, answers: { enable_cuda: false, install_opencv: false }, options: { workDir } })

    await runRecipe(buildOpencv, ctx)

    const args = system.calls.find((c) => c.cmd === 'cmake')?.args ?? []
    expect(args.some((a) => a.startsWith('WITH_FFMPEG='))).toBe(false)
    expect(gate.questions).toEqual(['Do you want to proceed?'])
  })

  it('removes a partial archive when wget fails so the next run downloads it again', async () => {
    const layout = opencvLayout(workDir, '4.x')
    const [core] = layout.archives
    const stalls: Responder = (cmd, args) => {
      if (cmd !== 'wget') return undefined
      mkdirSync(workDir, { recursive: true })
      writeFileSync(args[1], 'partial')
      return { exitCode: 4 }
    }

    const first = await runRecipe(buildOpencv, context(new FakeSystem([], stalls)))

    expect(first.result).toMatchObject({ status: 'aborted', step: 'sources' })
    expect(existsSync(core.zip)).toBe(false)

    const retry = new FakeSystem([], (cmd, args) => {
      if (cmd === 'unzip') mkdirSync(args[1].endsWith('opencv_contrib.zip') ? layout.contribDir : layout.sourceDir, { recursive: true })
      return undefined
    })
    await runRecipe(buildOpencv, context(retry))

    expect(retry.calls.filter((c) => c.cmd === 'wget').map((c) => c.args[1])).toEqual(layout.archives.map((a) => a.zip))
  })

  it('keeps going to verify when the system-wide install fails', async () => {
    await populateSources()
    const system = new FakeSystem([], (cmd, args) => {
      if (cmd === 'pkg-config') return { exitCode: 1 }
      if (cmd === 'make' && args[0] === 'install') return { exitCode: 2 }
      return undefined
    })

    const summary = await runRecipe(buildOpencv, context(system, { ...noCuda, install_opencv: true }))

    expect(summary.result?.status).toBe('completed')
    expect(summary.result?.reports.find((r) => r.name === 'install')?.result).toEqual({
      status: 'failed',
      reason: 'OpenCV installation failed'
    })
    expect(summary.result?.reports.map((r) => r.name).slice(-1)).toEqual(['verify'])
    expect(system.calls.some((c) => c.cmd === 'ldconfig')).toBe(false)
  })

  it('does not reinstall when pkg-config already reports OpenCV', async () => {
    await populateSources()
    const system = new FakeSystem([], (cmd) => (cmd === 'pkg-config' ? { output: '4.10.0\n' } : undefined))

    const summary = await runRecipe(buildOpencv, context(system, { ...noCuda, install_opencv: true }))

    expect(summary.result?.reports.find((r) => r.name === 'install')?.result).toEqual({
      status: 'skipped',
      reason: 'OpenCV is already installed (version 4.10.0)'
    })
    expect(system.calls.some((c) => c.cmd === 'make' && c.args[0] === 'install')).toBe(false)
  })
})
