export { Logger, type LogObject, type Transport, type LoggerOptions, type LoggerGlobalOptions } from './logger';
export { levels, getLevelName, isLevelName, isLevelEnabled, type LevelName, type LevelNumber } from './levels';
export { consoleTransport, filterTransport, byName, formatPretty, ANSI_COLORS } from './transports/index';
export type { ConsoleTransportOptions, FilterOptions, LogFilter } from './transports/index';
export { readLogConfig, buildLoggerOptions, type LogConfig } from './config';
