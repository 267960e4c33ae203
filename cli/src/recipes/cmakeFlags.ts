import type { BuildConfiguration } from '../installers/types.js'

const onOff = (value: boolean) => (value ? 'ON' : 'OFF')

/**
 * The `cmake` argument list for an OpenCV build, run from `<source>/build`.
 * Pure: nothing is touched until the caller invokes cmake with it.
 */
export function buildCmakeArgs(config: BuildConfiguration): string[] {
  const defs: Array<[string, string]> = [
    ['CMAKE_BUILD_TYPE', 'RELEASE'],
    ['CMAKE_INSTALL_PREFIX', config.installPrefix],
    ['WITH_TBB', 'ON'],
    ['ENABLE_FAST_MATH', '1'],
    ['CUDA_FAST_MATH', '1'],
    ['WITH_CUBLAS', '1'],
    ['WITH_CUDA', onOff(config.cudaEnabled)],
    ['WITH_CUDNN', onOff(config.cudaEnabled)],
    ['OPENCV_DNN_CUDA', onOff(config.cudaEnabled)]
  ]
  if (config.cudaEnabled && config.cudaArchBin) defs.push(['CUDA_ARCH_BIN', config.cudaArchBin])
  defs.push(
    ['BUILD_opencv_cudacodec', 'OFF'],
    ['CMAKE_C_COMPILER', config.cCompiler],
    ['CMAKE_CXX_COMPILER', config.cxxCompiler],
    ['WITH_V4L', 'ON'],
    ['WITH_QT', 'OFF']
  )
  if (config.ffmpegEnabled !== undefined) defs.push(['WITH_FFMPEG', onOff(config.ffmpegEnabled)])
  defs.push(
    ['WITH_OPENGL', 'ON'],
    ['WITH_GSTREAMER', 'ON'],
    ['OPENCV_GENERATE_PKGCONFIG', 'ON'],
    ['OPENCV_PC_FILE_NAME', 'opencv.pc'],
    ['OPENCV_ENABLE_NONFREE', 'ON'],
    ['OPENCV_EXTRA_MODULES_PATH', config.contribModulesPath],
    ['INSTALL_PYTHON_EXAMPLES', 'OFF'],
    ['INSTALL_C_EXAMPLES', 'OFF'],
    ['BUILD_EXAMPLES', 'OFF'],
    ['BUILD_opencv_python3', 'ON']
  )
  if (config.python) {
    defs.push(['PYTHON_EXECUTABLE', config.python.executable])
    if (config.python.packagesPath) defs.push(['PYTHON3_PACKAGES_PATH', config.python.packagesPath])
    if (config.python.numpyInclude) defs.push(['PYTHON3_NUMPY_INCLUDE_DIRS', config.python.numpyInclude])
  }
  return [...defs.flatMap(([key, value]) => ['-D', `${key}=${value}`]), '..']
}
