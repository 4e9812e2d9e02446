import type { Transport, LoggerOptions, LevelName } from './types';
import { isLevelName } from './levels';
import { consoleTransport } from './transports/console';
import { byName, filterTransport } from './transports/filter';

/**
 * Minimal ConfigProvider interface for logging configuration.
 * Defined locally to avoid circular dependency with @beanmap/config.
 */
interface ConfigProvider {
	get(key: string): Promise<string | undefined>;
}

/**
 * Logging configuration read from config provider.
 */
export interface LogConfig {
	/** Log level threshold. Default: 'info' */
	level: LevelName;
	/** Logger names to include (empty = all) */
	includeNames: string[];
	/** Logger names to exclude */
	excludeNames: string[];
	/** Use JSON format instead of pretty lines */
	jsonFormat: boolean;
}

/**
 * Parse comma-separated string into array, filtering empty values.
 */
function parseList(value: string | undefined): string[] {
	if (!value || value.trim() === '') return [];
	return value
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean);
}

/**
 * Read logging configuration from a config provider.
 *
 * Reads these keys:
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - LOG_INCLUDE_NAMES: comma-separated logger names to include
 * - LOG_EXCLUDE_NAMES: comma-separated logger names to exclude
 * - LOG_JSON: true | false (default: false)
 */
export async function readLogConfig(config: ConfigProvider): Promise<LogConfig> {
	const level = await config.get('LOG_LEVEL');

	return {
		level: isLevelName(level) ? level : 'info',
		includeNames: parseList(await config.get('LOG_INCLUDE_NAMES')),
		excludeNames: parseList(await config.get('LOG_EXCLUDE_NAMES')),
		jsonFormat: (await config.get('LOG_JSON')) === 'true'
	};
}

/**
 * Build logger options from a LogConfig.
 *
 * @example
 * ```ts
 * Logger.configure(buildLoggerOptions(await readLogConfig(new EnvConfigProvider())));
 * ```
 */
export function buildLoggerOptions(config: LogConfig): LoggerOptions {
	let transport: Transport = consoleTransport({ json: config.jsonFormat });

	if (config.includeNames.length > 0 || config.excludeNames.length > 0) {
		transport = filterTransport(transport, byName({ includeNames: config.includeNames, excludeNames: config.excludeNames }));
	}

	return { level: config.level, transports: [transport] };
}
