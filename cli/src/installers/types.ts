export type RecipeId = 'prepare-system' | 'docker-install' | 'build-opencv'
export type InstallerKind = 'apt' | 'snap' | 'pip'

export interface ProvisionOptions {
  dryRun: boolean
  assumeYes: boolean
  configPath: string | undefined
  workDir: string | undefined
}

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
}

export interface PackageSpec {
  readonly name: string
  readonly installer: InstallerKind
  readonly optional: boolean
  readonly classic?: boolean // snap --classic
  readonly noInstallRecommends?: boolean // apt --no-install-recommends
}

export type InstallOutcome =
  | { kind: 'already-present'; name: string }
  | { kind: 'installed'; name: string }
  | { kind: 'failed'; name: string; reason: string; exitCode: number }
  | { kind: 'skipped'; name: string; reason: 'user-declined' }

export interface ToolResult {
  exitCode: number
  output: string
  signal: NodeJS.Signals | null
  timedOut: boolean
}

export interface InvokeOptions {
  cwd?: string
  input?: string
  sudo?: boolean
  readOnly?: boolean
  timeoutMs?: number
}

export interface ToolInvoker {
  invoke: (cmd: string, args: string[], options?: InvokeOptions) => Promise<ToolResult>
}

export interface PromptGate {
  readonly interactive: boolean
  confirm: (question: string) => Promise<boolean>
  pause: (message: string) => Promise<void>
  close: () => void
}

export type StepResult =
  | { status: 'ok'; detail?: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string }

export interface Step {
  name: string
  title: string
  fatalOnFailure: boolean
  action: () => Promise<StepResult>
}

export interface StepReport {
  name: string
  result: StepResult
}

export type RunResult =
  | { status: 'completed'; reports: StepReport[] }
  | { status: 'aborted'; step: string; reason: string; reports: StepReport[] }

export type RunPhase =
  | { state: 'not-started' }
  | { state: 'prompting' }
  | { state: 'declined' }
  | { state: 'executing'; index: number; step: string }
  | { state: 'completed' }
  | { state: 'aborted'; step: string }

export interface BuildConfiguration {
  readonly cudaEnabled: boolean
  readonly cudaArchBin: string | undefined
  /** Unset leaves WITH_FFMPEG to OpenCV's default. */
  readonly ffmpegEnabled: boolean | undefined
  readonly installPrefix: string
  readonly cCompiler: string
  readonly cxxCompiler: string
  readonly contribModulesPath: string
  readonly python: PythonPaths | undefined
}

export interface PythonPaths {
  executable: string
  packagesPath: string | undefined
  numpyInclude: string | undefined
}

export interface ProvisionConfig {
  network: { timeoutSeconds: number }
  opencv: {
    version: string
    installPrefix: string
    cCompiler: string
    cxxCompiler: string
    jobs: number
    workDir: string
  }
  answers: Record<string, boolean>
}

export interface PackageCatalog {
  prepare: { apt: PackageSpec[]; snap: PackageSpec[] }
  docker: { conflicts: PackageSpec[]; prerequisites: PackageSpec[]; engine: PackageSpec[] }
  opencv: { required: PackageSpec[]; optional: PackageSpec[]; cudaDependencies: PackageSpec[] }
}
