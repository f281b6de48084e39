export type { MemoryExecutorConfig } from './executor.js'
export { createMemoryExecutor } from './executor.js'
export { applyOperations } from './operations.js'
export { unpivot } from './unpivot.js'
