export { createLogger } from './logger';
export type { CreateLoggerOptions } from './logger';
export { RotatingFileStream } from './rotating-stream';
export type { RotatingFileStreamOptions } from './rotating-stream';
