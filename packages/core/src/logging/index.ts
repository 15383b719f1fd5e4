export type { Logger } from './Logger.js';
export { silentLogger } from './Logger.js';
