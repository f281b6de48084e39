// Golden-file and compiler suites

export type { CompilerContractTarget } from './compilerContract.js'
export { describeCompilerContract } from './compilerContract.js'
export type { CompilerPair } from './discovery.js'
export { discoverCases, discoverCompilerPairs } from './discovery.js'
export type { GoldenSuiteOptions } from './goldenSuite.js'
export { describeFailure, describeGoldenSuite } from './goldenSuite.js'
