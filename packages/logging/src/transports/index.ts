export { consoleTransport, formatPretty, ANSI_COLORS, type ConsoleTransportOptions } from './console';
export { filterTransport, byName, type FilterOptions, type LogFilter } from './filter';
