export { createLogger } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';

export * from './types.js';
export * from './schemas.js';
export { StagefileLogger } from './stagefile-logger.js';
export type { StagefileLoggerConfig } from './stagefile-logger.js';
export { createTransport, createTransports } from './transport-factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export type { ConsoleTransportConfig } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export type { FileTransportConfig } from './transports/file-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
