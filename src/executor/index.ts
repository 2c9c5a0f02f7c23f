export { RequestExecutor, downloadFileName } from './executor.js';
export type { ExecutorDependencies, PerformOptions } from './executor.js';
