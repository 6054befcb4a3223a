export { HeatPumpClient } from './HeatPumpClient';
export type { ClientOptions } from './config';
export { DEFAULT_BASE_URLS } from './config';
export {
  AuthenticationError,
  ConversionError,
  HeatPumpError,
  ParseError,
  TransportError,
} from './errors';
export type { AuthFailureReason, TransportErrorKind } from './errors';
export type { Logger } from './logger';
export { consoleLogger, silentLogger } from './logger';
export { DATA_POINTS } from './Normalizer';
export type { DataPointDefinition } from './Normalizer';
export { formatDeviceId, parseDeviceId } from './types';
export type {
  ApiVersion,
  DataPointValue,
  Device,
  DeviceData,
  DeviceRef,
  RegisterDump,
  RegisterFetchOptions,
} from './types';
