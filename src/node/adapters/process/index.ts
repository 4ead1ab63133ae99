export { NodeProcessRunner } from './NodeProcessRunner'
export { combinedOutput } from './interface'
export type { ProcessResult, ProcessRunner, RunOptions } from './interface'
