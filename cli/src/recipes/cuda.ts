import fs from 'fs-extra'
import type { Logger, ToolInvoker } from '../installers/types.js'
import { firstLine } from '../installers/utils.js'

export const CUDNN_HEADERS = ['/usr/include/cudnn.h', '/usr/local/cuda/include/cudnn.h']
export const CUDNN_VERSION_HEADER = '/usr/include/cudnn_version.h'

export const CUDA_ENV_HINT = [
  'Ensure the following paths are set before using OpenCV with CUDA:',
  '  export CUDNN_PATH=/usr/local/cuda/lib64',
  '  export LD_LIBRARY_PATH=/usr/local/cuda/lib64:$LD_LIBRARY_PATH',
  '  export LD_LIBRARY_PATH=/usr/lib/x86_64-linux-gnu:$LD_LIBRARY_PATH',
  'If you experience issues, add these lines to ~/.bashrc or ~/.zshrc and re-source it.'
]

/** GPU compute capability (e.g. "8.6") of the first device, when a driver is present. */
export async function queryComputeCapability(invoker: ToolInvoker): Promise<string | undefined> {
  const res = await invoker.invoke('nvidia-smi', ['--query-gpu=compute_cap', '--format=csv,noheader'], { readOnly: true })
  if (res.exitCode !== 0) return undefined
  return firstLine(res.output) || undefined
}

export interface CudaReport {
  driver: string | undefined
  nvcc: string | undefined
  cudnn: string | undefined
}

function lineContaining(text: string, needle: string): string | undefined {
  return text.split('\n').map((l) => l.trim()).find((l) => l.includes(needle))
}

export async function detectCuda(
  invoker: ToolInvoker,
  headers: { cudnn: readonly string[]; version: string } = { cudnn: CUDNN_HEADERS, version: CUDNN_VERSION_HEADER }
): Promise<CudaReport> {
  const smi = await invoker.invoke('nvidia-smi', [], { readOnly: true })
  const nvcc = await invoker.invoke('nvcc', ['--version'], { readOnly: true })

  let cudnn: string | undefined
  for (const header of headers.cudnn) {
    if (await fs.pathExists(header)) {
      const versionText = await fs.readFile(headers.version, 'utf8').catch(() => '')
      cudnn = lineContaining(versionText, '#define CUDNN_MAJOR') ?? 'version info not found'
      break
    }
  }

  return {
    driver: smi.exitCode === 0 ? lineContaining(smi.output, 'Driver Version') ?? 'installed' : undefined,
    nvcc: nvcc.exitCode === 0 ? lineContaining(nvcc.output, 'release') ?? 'installed' : undefined,
    cudnn
  }
}

export function logCudaReport(report: CudaReport, logger: Logger): void {
  const line = (label: string, value: string | undefined) => {
    if (value) logger.ok(`[✔] ${label} is installed: ${value}`)
    else logger.err(`[✘] ${label} is NOT installed!`)
  }
  line('NVIDIA driver', report.driver)
  line('CUDA', report.nvcc)
  line('cuDNN', report.cudnn)
}
