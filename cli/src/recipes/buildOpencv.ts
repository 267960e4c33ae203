import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import type { ProvisionContext, Recipe } from '../installers/context.js'
import type { BuildConfiguration, PythonPaths, ToolInvoker } from '../installers/types.js'
import { failedNames, summarizeOutcomes } from '../installers/packageInstaller.js'
import { ResourceMissing, ToolFailure } from '../installers/errors.js'
import { runChecked } from '../installers/invoker.js'
import { failed, ok, skipped } from '../installers/stepRunner.js'
import { firstLine, isNonEmptyDir } from '../installers/utils.js'
import { buildCmakeArgs } from './cmakeFlags.js'
import { CUDA_ENV_HINT, detectCuda, logCudaReport, queryComputeCapability } from './cuda.js'

export interface OpencvLayout {
  workDir: string
  sourceDir: string
  contribDir: string
  buildDir: string
  archives: Array<{ label: string; url: string; zip: string; dir: string }>
}

export function opencvLayout(workDir: string, version: string): OpencvLayout {
  const sourceDir = path.join(workDir, `opencv-${version}`)
  const contribDir = path.join(workDir, `opencv_contrib-${version}`)
  return {
    workDir,
    sourceDir,
    contribDir,
    buildDir: path.join(sourceDir, 'build'),
    archives: [
      {
        label: 'OpenCV',
        url: `https://github.com/opencv/opencv/archive/${version}.zip`,
        zip: path.join(workDir, 'opencv.zip'),
        dir: sourceDir
      },
      {
        label: 'OpenCV Contrib',
        url: `https://github.com/opencv/opencv_contrib/archive/${version}.zip`,
        zip: path.join(workDir, 'opencv_contrib.zip'),
        dir: contribDir
      }
    ]
  }
}

export async function resolvePython(invoker: ToolInvoker): Promise<PythonPaths | undefined> {
  const py = (code: string) => invoker.invoke('python3', ['-c', code], { readOnly: true })
  const exe = await py('import sys; print(sys.executable)')
  const executable = firstLine(exe.output)
  if (exe.exitCode !== 0 || !executable) return undefined
  const site = await py('import site; print(site.getsitepackages()[0])')
  const numpy = await py('import numpy; print(numpy.get_include())')
  return {
    executable,
    packagesPath: site.exitCode === 0 ? firstLine(site.output) || undefined : undefined,
    numpyInclude: numpy.exitCode === 0 ? firstLine(numpy.output) || undefined : undefined
  }
}

async function installedOpencvVersion(invoker: ToolInvoker): Promise<string | undefined> {
  const res = await invoker.invoke('pkg-config', ['--modversion', 'opencv4'], { readOnly: true })
  return res.exitCode === 0 ? firstLine(res.output) || undefined : undefined
}

function resolveWorkDir(ctx: ProvisionContext): string {
  return path.resolve(ctx.cwd, ctx.options.workDir ?? ctx.config.opencv.workDir)
}

export const buildOpencv: Recipe = {
  id: 'build-opencv',
  title: 'Build OpenCV',
  requiredTools: ['apt-get', 'dpkg-query', 'pip3', 'wget', 'unzip', 'cmake', 'make', 'pkg-config', 'python3', 'ldconfig'],
  optionalTools: ['nvidia-smi', 'nvcc'],

  summary: (ctx) => {
    const layout = opencvLayout(resolveWorkDir(ctx), ctx.config.opencv.version)
    return [
      'Builds OpenCV and opencv_contrib from source.',
      `1. Install build tools (${ctx.catalog.opencv.required.map((s) => s.name).join(', ')})`,
      `2. Download and extract sources into ${layout.workDir}`,
      '3. Optionally enable CUDA and install CUDA build dependencies',
      `4. Configure with CMake in ${layout.buildDir} and compile`,
      `5. Optionally install to ${ctx.config.opencv.installPrefix}`,
      '6. Verify the build'
    ]
  },

  steps: (ctx) => {
    const { opencv } = ctx.config
    const layout = opencvLayout(resolveWorkDir(ctx), opencv.version)
    const cuda: { enabled: boolean; archBin: string | undefined } = { enabled: false, archBin: undefined }
    let configureSkipped = false

    return [
      {
        name: 'build-tools',
        title: 'Install build tools',
        fatalOnFailure: false,
        action: async () => {
          const outcomes = await ctx.packages.ensureAll([...ctx.catalog.opencv.required, ...ctx.catalog.opencv.optional])
          const bad = failedNames(outcomes)
          return bad.length ? failed(`could not install ${bad.join(', ')}`) : ok(summarizeOutcomes(outcomes))
        }
      },
      {
        name: 'sources',
        title: 'Download and extract sources',
        fatalOnFailure: true,
        action: async () => {
          if (await isNonEmptyDir(layout.sourceDir)) {
            return skipped(`${layout.sourceDir} already exists and is not empty`)
          }
          if (!ctx.options.dryRun) await fs.ensureDir(layout.workDir)
          for (const archive of layout.archives) {
            if (await fs.pathExists(archive.zip)) {
              ctx.logger.info(`[✔] ${path.basename(archive.zip)} already downloaded`)
            } else {
              ctx.logger.info(`[↓] Downloading ${archive.label}...`)
              try {
                await runChecked(ctx.invoker, 'wget', ['-O', archive.zip, archive.url], { cwd: layout.workDir })
              } catch (error) {
                // wget -O leaves a truncated file behind on failure
                if (!ctx.options.dryRun) await fs.remove(archive.zip)
                throw error
              }
            }
          }
          for (const archive of layout.archives) {
            if (await fs.pathExists(archive.dir)) {
              ctx.logger.info(`[✔] ${path.basename(archive.dir)} already extracted`)
            } else {
              ctx.logger.info(`[→] Extracting ${archive.label}...`)
              await runChecked(ctx.invoker, 'unzip', ['-q', archive.zip], { cwd: layout.workDir })
            }
          }
          for (const archive of layout.archives) {
            if (!(await fs.pathExists(archive.zip))) continue
            if (ctx.options.dryRun) ctx.logger.log(`[dry-run] rm ${archive.zip}`)
            else await fs.remove(archive.zip)
          }
          return ok('OpenCV and OpenCV Contrib are ready')
        }
      },
      {
        name: 'cuda',
        title: 'CUDA support',
        fatalOnFailure: false,
        action: async () => {
          cuda.enabled = await ctx.decisions.ask('enable_cuda', 'Do you want to enable CUDA support?')
          if (!cuda.enabled) return skipped('CUDA support disabled')

          cuda.archBin = await queryComputeCapability(ctx.invoker)
          if (!cuda.archBin) ctx.logger.warn('Could not read the GPU compute capability; CUDA_ARCH_BIN is left to CMake')

          if (await ctx.decisions.ask('check_cuda', 'Do you want to check for CUDA support (driver, nvcc, cuDNN)?')) {
            logCudaReport(await detectCuda(ctx.invoker), ctx.logger)
          }
          const [first, ...rest] = CUDA_ENV_HINT
          ctx.logger.warn(first)
          for (const line of rest) ctx.logger.log(line)

          if (await ctx.decisions.ask('install_cuda_deps', 'Do you want to install additional dependencies for CUDA support?')) {
            const outcomes = await ctx.packages.ensureAll(ctx.catalog.opencv.cudaDependencies)
            const bad = failedNames(outcomes)
            if (bad.length) return failed(`could not install ${bad.join(', ')}`)
          }
          return ok(cuda.archBin ? `CUDA_ARCH_BIN=${cuda.archBin}` : 'CUDA enabled')
        }
      },
      {
        name: 'configure',
        title: 'Configure with CMake',
        fatalOnFailure: true,
        action: async () => {
          if (!(await fs.pathExists(layout.sourceDir))) {
            throw new ResourceMissing(layout.sourceDir, 'Please ensure it is downloaded and extracted.')
          }
          if (await fs.pathExists(path.join(layout.buildDir, 'Makefile'))) {
            configureSkipped = true
            return skipped('OpenCV has already been built')
          }

          const ffmpegEnabled = cuda.enabled
            ? await ctx.decisions.ask(
                'enable_ffmpeg',
                'Do you want to set WITH_FFMPEG=ON? This may cause errors if required packages are missing.'
              )
            : undefined
          const python = await resolvePython(ctx.invoker)
          if (!python) ctx.logger.warn('python3 not found; Python bindings will use CMake defaults')

          const config: BuildConfiguration = Object.freeze({
            cudaEnabled: cuda.enabled,
            cudaArchBin: cuda.archBin,
            ffmpegEnabled,
            installPrefix: opencv.installPrefix,
            cCompiler: opencv.cCompiler,
            cxxCompiler: opencv.cxxCompiler,
            contribModulesPath: path.join(layout.contribDir, 'modules'),
            python
          })

          if (ctx.options.dryRun) ctx.logger.log(`[dry-run] mkdir -p ${layout.buildDir}`)
          else await fs.ensureDir(layout.buildDir)

          const res = await ctx.invoker.invoke('cmake', buildCmakeArgs(config), { cwd: layout.buildDir })
          if (res.exitCode !== 0) return failed('CMake configuration failed. Please check the output for details.')
          const ffmpeg = ffmpegEnabled === undefined ? 'default' : ffmpegEnabled ? 'on' : 'off'
          return ok(`CUDA ${cuda.enabled ? 'on' : 'off'}, FFmpeg ${ffmpeg}`)
        }
      },
      {
        name: 'compile',
        title: 'Compile',
        fatalOnFailure: true,
        action: async () => {
          if (configureSkipped) return skipped('existing build left as is')
          const jobs = opencv.jobs > 0 ? opencv.jobs : os.availableParallelism()
          try {
            await runChecked(ctx.invoker, 'make', [`-j${jobs}`], { cwd: layout.buildDir })
          } catch (error) {
            if (error instanceof ToolFailure) return failed(`Error during the build process (exit ${error.exitCode})`)
            throw error
          }
          return ok(`built with ${jobs} job(s)`)
        }
      },
      {
        name: 'install',
        title: 'Install system-wide',
        fatalOnFailure: false,
        action: async () => {
          const install = await ctx.decisions.ask(
            'install_opencv',
            "Do you want to install OpenCV system-wide with 'sudo make install'?"
          )
          if (!install) return skipped(`run 'sudo make install' in ${layout.buildDir} later`)

          const version = await installedOpencvVersion(ctx.invoker)
          if (version) return skipped(`OpenCV is already installed (version ${version})`)

          const make = await ctx.invoker.invoke('make', ['install'], { cwd: layout.buildDir, sudo: true })
          if (make.exitCode !== 0) return failed('OpenCV installation failed')
          const ldconfig = await ctx.invoker.invoke('ldconfig', [], { sudo: true })
          if (ldconfig.exitCode !== 0) return failed('ldconfig failed after install')
          return ok(`installed to ${opencv.installPrefix}`)
        }
      },
      {
        name: 'verify',
        title: 'Verify build',
        fatalOnFailure: false,
        action: async () => {
          const { buildDir } = layout
          if (!(await fs.pathExists(buildDir))) return failed(`build directory not found: ${buildDir}`)

          const missing: string[] = []
          for (const dir of ['bin', 'lib']) {
            if (!(await fs.pathExists(path.join(buildDir, dir)))) missing.push(dir)
          }
          const entries = await fs.readdir(buildDir)
          if (!entries.some((e) => e.startsWith('OpenCVConfig') && e.endsWith('.cmake'))) missing.push('OpenCVConfig*.cmake')
          if (!entries.includes('OpenCVModules.cmake')) missing.push('OpenCVModules.cmake')

          if (await fs.pathExists(path.join(buildDir, 'bin', 'opencv_test_core'))) {
            ctx.logger.info('opencv_test_core is available in bin/')
          } else {
            ctx.logger.warn('opencv_test_core binary not found; core test skipped')
          }

          const version = await installedOpencvVersion(ctx.invoker)
          if (version) ctx.logger.ok(`[✔] OpenCV is installed (version ${version})`)
          else ctx.logger.warn('[✘] OpenCV is NOT installed system-wide')

          return missing.length ? failed(`missing build files: ${missing.join(', ')}`) : ok('build artefacts present')
        }
      }
    ]
  }
}
