export type {
  NetworkController,
  RequestOptions,
  VlanFetchResult,
} from './NetworkController.js';
export type { ControllerClientOptions } from './ControllerClient.js';
export { ControllerClient } from './ControllerClient.js';
