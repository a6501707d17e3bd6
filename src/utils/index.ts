export { abortableDelay } from './delay.js';
export { createLogger, createTargetLogger, createSilentLogger, type LoggerOptions } from './logger.js';
export { splitHost, isIpAddress, normalizeUrl, isHttpUrl, type HostParts } from './domain.js';
export { ConfigurationError, isConfigurationError, errorMessage, type ConfigurationErrorCode } from './errors.js';
export { readLineList } from './files.js';
