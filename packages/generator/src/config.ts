import { ValidatedConfig, type ConfigProvider } from '@beanmap/config';
import type { Logger } from '@beanmap/logging';
import { InvalidArgumentError } from '@beanmap/runtime';
import type { ImportExtension } from './converter-emitter';
import { DEFAULT_RUNTIME_MODULE, type GenerateOptions } from './generate';

export type GeneratorConfig = Required<Pick<GenerateOptions, 'tsConfigFilePath' | 'rootDir' | 'outDir' | 'runtimeModule' | 'importExtension'>>;

function isImportExtension(value: string): value is ImportExtension {
	return value === '' || value === '.js';
}

/**
 * Read generator settings from a config provider.
 *
 * Reads these keys:
 * - BEANMAP_TSCONFIG: project tsconfig (default: tsconfig.json)
 * - BEANMAP_ROOT_DIR: root of qualified names (default: src)
 * - BEANMAP_OUT_DIR: output directory (default: src/generated)
 * - BEANMAP_RUNTIME_MODULE: module converters import from (default: @beanmap/runtime)
 * - BEANMAP_IMPORT_EXTENSION: '' or '.js' (default: '')
 *
 * Blank values fall back to the defaults.
 */
export async function readGeneratorConfig(config: ConfigProvider, logger?: Logger): Promise<GeneratorConfig> {
	const validated = await new ValidatedConfig(config, logger)
		.allowKeys(
			'BEANMAP_TSCONFIG',
			'BEANMAP_ROOT_DIR',
			'BEANMAP_OUT_DIR',
			'BEANMAP_RUNTIME_MODULE',
			'BEANMAP_IMPORT_EXTENSION'
		)
		.validate();

	const importExtension = validated.getSync('BEANMAP_IMPORT_EXTENSION') ?? '';
	if (!isImportExtension(importExtension)) {
		throw new InvalidArgumentError('BEANMAP_IMPORT_EXTENSION', `expected '' or '.js', got '${importExtension}'`);
	}

	return {
		tsConfigFilePath: validated.getSync('BEANMAP_TSCONFIG') ?? 'tsconfig.json',
		rootDir: validated.getSync('BEANMAP_ROOT_DIR') ?? 'src',
		outDir: validated.getSync('BEANMAP_OUT_DIR') ?? 'src/generated',
		runtimeModule: validated.getSync('BEANMAP_RUNTIME_MODULE') ?? DEFAULT_RUNTIME_MODULE,
		importExtension
	};
}
