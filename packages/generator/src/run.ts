import { EnvConfigProvider, type ConfigProvider } from '@beanmap/config';
import { Logger, buildLoggerOptions, readLogConfig } from '@beanmap/logging';
import { readGeneratorConfig } from './config';
import { generateConverters, type GenerateResult } from './generate';

/**
 * Build-step entry point. Configures logging from the `LOG_*` keys, reads the
 * `BEANMAP_*` generator keys and runs one generation pass. Global log
 * transports are flushed and closed before it settles.
 *
 * @example
 * ```ts
 * // scripts/generate-converters.ts
 * await runGenerator();
 * ```
 */
export async function runGenerator(config: ConfigProvider = new EnvConfigProvider()): Promise<GenerateResult> {
	Logger.configure(buildLoggerOptions(await readLogConfig(config)));
	try {
		return await generateConverters(await readGeneratorConfig(config));
	} finally {
		await Logger.shutdown();
	}
}
