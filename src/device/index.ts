export { LinkplayClient, CLIENT_DEFAULTS } from './client.js';
export type { ClientOptions, MultiroomInfo } from './client.js';
export { COMMANDS } from './catalog.js';
export type { Command, CommandId, MasterNetwork } from './catalog.js';
export { parseEndpoint, endpointUrl, formatEndpoint } from './endpoint.js';
export type { DeviceEndpoint } from './endpoint.js';
export { HttpTransport, DEFAULT_TIMEOUT_MS } from './transport.js';
export type { Transport, HttpTransportOptions } from './transport.js';
export { normalize, unwrap } from './normalizer.js';
export type { Result, ResponseShape, DeviceRecord } from './normalizer.js';
export * from './modes.js';
export * from '../errors.js';
