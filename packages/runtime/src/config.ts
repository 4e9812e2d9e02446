import { ValidatedConfig, type ConfigProvider } from '@beanmap/config';
import type { Logger } from '@beanmap/logging';
import { join } from 'node:path';
import { MANIFEST_FILE_NAME } from './constants';

/**
 * Where the registry finds generated converters.
 */
export interface RegistryConfig {
	/** Directory holding `auto-mappings/` and the manifest */
	baseDir: string;
	manifestPath: string;
}

/**
 * Read registry settings from a config provider.
 *
 * Reads these keys:
 * - BEANMAP_REGISTRY_DIR: generated output directory (required)
 * - BEANMAP_MANIFEST_PATH: manifest file (default: `<dir>/map-converter-registry.json`)
 *
 * @throws MissingConfigError when BEANMAP_REGISTRY_DIR is unset or blank
 */
export async function readRegistryConfig(config: ConfigProvider, logger?: Logger): Promise<RegistryConfig> {
	const validated = await new ValidatedConfig(config, logger)
		.expectKeys('BEANMAP_REGISTRY_DIR')
		.allowKeys('BEANMAP_MANIFEST_PATH')
		.onFail('error')
		.validate();

	const baseDir = validated.getRequiredSync('BEANMAP_REGISTRY_DIR');
	return { baseDir, manifestPath: validated.getSync('BEANMAP_MANIFEST_PATH') ?? join(baseDir, MANIFEST_FILE_NAME) };
}
