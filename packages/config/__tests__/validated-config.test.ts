import { describe, test, expect } from 'vitest';
import { MissingConfigError, ValidatedConfig } from '../src/validated-config';
import { EnvConfigProvider } from '../src/env-config';
import { Logger, type LogObject, type Transport } from '@beanmap/logging';

function createRecordingLogger(): { logger: Logger; logs: LogObject[] } {
	const logs: LogObject[] = [];
	const transport: Transport = {
		write: (obj) => {
			logs.push(obj);
		},
		flush: async () => {},
		close: async () => {}
	};
	return { logger: new Logger('Config', { level: 'debug', transports: [transport] }), logs };
}

describe('ValidatedConfig', () => {
	const provider = new EnvConfigProvider({
		BEANMAP_REGISTRY_DIR: 'dist/generated',
		BEANMAP_EMPTY: ''
	});

	describe('delegation', () => {
		test('should delegate get() and getRequired() to wrapped provider', async () => {
			const validated = new ValidatedConfig(provider, createRecordingLogger().logger);

			expect(await validated.get('BEANMAP_REGISTRY_DIR')).toBe('dist/generated');
			expect(await validated.getRequired('BEANMAP_REGISTRY_DIR')).toBe('dist/generated');
		});

		test('should propagate errors from wrapped provider', async () => {
			const validated = new ValidatedConfig(provider, createRecordingLogger().logger);
			await expect(validated.getRequired('BEANMAP_MISSING')).rejects.toThrow();
		});
	});

	describe('validate', () => {
		test('should throw MissingConfigError naming unset and blank keys in error mode', async () => {
			const validated = new ValidatedConfig(provider, createRecordingLogger().logger)
				.expectKeys('BEANMAP_REGISTRY_DIR', 'BEANMAP_EMPTY', 'BEANMAP_MISSING')
				.onFail('error');

			const error = await validated.validate().catch((caught: unknown) => caught);

			expect(error).toBeInstanceOf(MissingConfigError);
			if (error instanceof MissingConfigError) {
				expect(error.keys).toEqual(['BEANMAP_EMPTY', 'BEANMAP_MISSING']);
				expect(error.message).toBe('Missing required config keys: BEANMAP_EMPTY, BEANMAP_MISSING');
			}
		});

		test('should only warn in warn mode', async () => {
			const { logger, logs } = createRecordingLogger();

			await new ValidatedConfig(provider, logger).expectKeys('BEANMAP_MISSING').validate();

			expect(logs).toHaveLength(1);
			expect(logs[0]).toMatchObject({ level: 30, msg: 'Missing required config keys', missing: ['BEANMAP_MISSING'] });
		});

		test('should not fail for unset optional keys', async () => {
			const { logger, logs } = createRecordingLogger();

			await new ValidatedConfig(provider, logger)
				.expectKeys('BEANMAP_REGISTRY_DIR')
				.allowKeys('BEANMAP_MANIFEST_PATH')
				.onFail('error')
				.validate();

			expect(logs[0]).toMatchObject({ level: 10, msg: 'Config validated', keys: 2 });
		});
	});

	describe('sync access', () => {
		test('should refuse sync access before validate()', () => {
			const validated = new ValidatedConfig(provider, createRecordingLogger().logger).expectKeys(
				'BEANMAP_REGISTRY_DIR'
			);
			expect(() => validated.getSync('BEANMAP_REGISTRY_DIR')).toThrow(
				'Cannot use getSync() before validate() is called'
			);
		});

		test('should return loaded values after validate()', async () => {
			const validated = await new ValidatedConfig(provider, createRecordingLogger().logger)
				.expectKeys('BEANMAP_REGISTRY_DIR')
				.allowKeys('BEANMAP_MANIFEST_PATH', 'BEANMAP_EMPTY')
				.validate();

			expect(validated.getRequiredSync('BEANMAP_REGISTRY_DIR')).toBe('dist/generated');
			expect(validated.getSync('BEANMAP_MANIFEST_PATH')).toBeUndefined();
			expect(validated.getSync('BEANMAP_EMPTY')).toBeUndefined();
		});

		test('should refuse keys that were not declared', async () => {
			const validated = await new ValidatedConfig(provider, createRecordingLogger().logger)
				.expectKeys('BEANMAP_REGISTRY_DIR')
				.validate();

			expect(() => validated.getSync('BEANMAP_OUT_DIR')).toThrow('Key "BEANMAP_OUT_DIR" was not declared');
		});

		test('should throw MissingConfigError from getRequiredSync for blank values', async () => {
			const validated = await new ValidatedConfig(provider, createRecordingLogger().logger)
				.allowKeys('BEANMAP_EMPTY')
				.validate();

			expect(() => validated.getRequiredSync('BEANMAP_EMPTY')).toThrow(
				'Missing required config keys: BEANMAP_EMPTY'
			);
		});
	});
});
