export {
  buildTransportOptions,
  buildEnvironmentOverrides,
  validateTransportConfig,
} from './option-builder.js';
export { createTransferRequest, extractUrlCredentials } from './request.js';
export type { ExtractedCredentials } from './request.js';
export type { TransportConfig, TransportOptions, TransferRequest } from './types.js';
