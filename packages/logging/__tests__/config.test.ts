import { describe, test, expect, vi } from 'vitest';
import { readLogConfig, buildLoggerOptions } from '../src/config';
import type { LogObject } from '../src/types';

function createMockConfigProvider(values: Record<string, string | undefined>) {
	return {
		async get(key: string): Promise<string | undefined> {
			return values[key];
		}
	};
}

describe('readLogConfig', () => {
	test('should return defaults when no config provided', async () => {
		const result = await readLogConfig(createMockConfigProvider({}));

		expect(result).toEqual({ level: 'info', includeNames: [], excludeNames: [], jsonFormat: false });
	});

	test('should read level, name lists and JSON flag', async () => {
		const result = await readLogConfig(
			createMockConfigProvider({
				LOG_LEVEL: 'debug',
				LOG_INCLUDE_NAMES: 'Generator, ConverterRegistry,',
				LOG_EXCLUDE_NAMES: 'Config',
				LOG_JSON: 'true'
			})
		);

		expect(result).toEqual({
			level: 'debug',
			includeNames: ['Generator', 'ConverterRegistry'],
			excludeNames: ['Config'],
			jsonFormat: true
		});
	});

	test('should fall back to info for an unknown level', async () => {
		const result = await readLogConfig(createMockConfigProvider({ LOG_LEVEL: 'verbose' }));
		expect(result.level).toBe('info');
	});
});

describe('buildLoggerOptions', () => {
	test('should carry the level and a single transport', () => {
		const options = buildLoggerOptions({ level: 'warn', includeNames: [], excludeNames: [], jsonFormat: true });

		expect(options.level).toBe('warn');
		expect(options.transports).toHaveLength(1);
	});

	test('should filter by name when include names are configured', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
		const options = buildLoggerOptions({
			level: 'info',
			includeNames: ['Generator'],
			excludeNames: [],
			jsonFormat: true
		});
		const entry: LogObject = { time: 0, level: 20, msg: 'hidden', name: 'Config' };

		for (const transport of options.transports ?? []) {
			transport.write(entry);
		}

		expect(spy).not.toHaveBeenCalled();
		spy.mockRestore();
	});
});
