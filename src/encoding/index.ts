export { TaskEncoder } from './encoder.js';
export type { EncodedRequest } from './encoder.js';
