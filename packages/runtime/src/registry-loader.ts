import type { Dirent } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { Logger } from '@beanmap/logging';
import { CONVERTER_NAMESPACE, CONVERTER_SUFFIX, MANIFEST_FILE_NAME } from './constants';
import { isConverterClass, isMappingConvert, type MappingConvert } from './contract';
import { ConfigurationError } from './errors';
import { parseManifest, parseQualifiedName } from './manifest';
import { ConverterRegistry } from './registry';

/** Loads a module by absolute file path. */
export type ModuleImporter = (file: string) => Promise<unknown>;

export interface RegistryOptions {
	/** Directory the generator wrote to (holds the manifest and `auto-mappings/`). */
	baseDir: string;
	/** Manifest location; defaults to `<baseDir>/map-converter-registry.json`. */
	manifestPath?: string;
	/** Module extensions tried in order, default `['.js', '.ts']`. */
	extensions?: readonly string[];
	importModule?: ModuleImporter;
	logger?: Logger;
}

export type RegistryStrategy = 'manifest' | 'scan' | 'empty';

const DEFAULT_EXTENSIONS: readonly string[] = ['.js', '.ts'];

const defaultImporter: ModuleImporter = (file) => import(pathToFileURL(file).href);

interface LoadContext {
	readonly baseDir: string;
	readonly extensions: readonly string[];
	readonly importModule: ModuleImporter;
	readonly log: Logger;
}

/**
 * Builds the converter registry for a generated output directory.
 *
 * Sources are tried in order: the manifest, then a scan of the converter
 * namespace, then an empty registry. An unreadable or empty manifest falls
 * through to the scan; a converter that fails to load aborts the build.
 *
 * @example
 * ```ts
 * const registry = await buildRegistry({ baseDir: new URL('./generated', import.meta.url).pathname });
 * registry.get(User)?.toMap(user);
 * ```
 */
export async function buildRegistry(options: RegistryOptions): Promise<ConverterRegistry> {
	const baseDir = resolve(options.baseDir);
	const log = (options.logger ?? new Logger('ConverterRegistry')).with({ baseDir });
	const ctx: LoadContext = {
		baseDir,
		extensions: options.extensions ?? DEFAULT_EXTENSIONS,
		importModule: options.importModule ?? defaultImporter,
		log
	};
	const manifestPath = resolve(options.manifestPath ?? join(ctx.baseDir, MANIFEST_FILE_NAME));
	const started = performance.now();

	let strategy: RegistryStrategy = 'manifest';
	let converters = await loadFromManifest(manifestPath, ctx);

	if (converters === undefined) {
		strategy = 'scan';
		converters = await scanConverters(ctx);
	}

	if (converters.length === 0) {
		strategy = 'empty';
		log.warn('No converters found');
	}

	const registry = ConverterRegistry.of(converters, log);
	log.info('Converter registry built', {
		strategy,
		count: registry.size,
		durationMs: Math.round(performance.now() - started)
	});
	return registry;
}

/**
 * Converters listed in the manifest, or undefined when the manifest is
 * missing, unreadable or empty.
 */
async function loadFromManifest(
	manifestPath: string,
	ctx: LoadContext
): Promise<MappingConvert<unknown>[] | undefined> {
	let text: string;
	try {
		text = await readFile(manifestPath, 'utf8');
	} catch (error) {
		if (isMissing(error)) {
			ctx.log.debug('Manifest not found', { manifestPath });
		} else {
			ctx.log.warn('Manifest could not be read', { manifestPath, error });
		}
		return undefined;
	}

	const parsed = parseManifest(text);
	if (!parsed.ok) {
		ctx.log.warn('Manifest ignored', { manifestPath, reason: parsed.reason });
		return undefined;
	}

	const entries = Object.entries(parsed.manifest);
	if (entries.length === 0) {
		ctx.log.warn('Manifest ignored', { manifestPath, reason: 'manifest is empty' });
		return undefined;
	}

	const converters: MappingConvert<unknown>[] = [];
	for (const [typeName, converterName] of entries) {
		const fqn = parseQualifiedName(converterName);
		if (!fqn) {
			throw new ConfigurationError(typeName, `malformed converter name '${converterName}'`);
		}

		const file = await resolveModuleFile(join(ctx.baseDir, fqn.modulePath), ctx.extensions);
		if (!file) {
			throw new ConfigurationError(typeName, `converter module '${fqn.modulePath}' not found under ${ctx.baseDir}`);
		}

		const exports = await importExports(file, typeName, ctx);
		const candidate = exports.get(fqn.exportName);
		if (!isConverterClass(candidate)) {
			throw new ConfigurationError(typeName, `'${fqn.exportName}' is not a converter class in ${file}`);
		}
		converters.push(instantiate(candidate, typeName));
	}
	return converters;
}

/**
 * Every converter class exported from `*_MapConverter` modules under the
 * converter namespace, in path order.
 */
async function scanConverters(ctx: LoadContext): Promise<MappingConvert<unknown>[]> {
	const root = join(ctx.baseDir, CONVERTER_NAMESPACE);
	const files = (await listFiles(root)).filter((file) => isConverterModule(file, ctx.extensions)).sort();
	ctx.log.debug('Scanning converter modules', { root, files: files.length });

	const converters: MappingConvert<unknown>[] = [];
	for (const file of files) {
		const exports = await importExports(file, file, ctx);
		for (const [exportName, candidate] of exports) {
			if (isConverterClass(candidate)) {
				converters.push(instantiate(candidate, exportName));
			}
		}
	}
	return converters;
}

function isConverterModule(file: string, extensions: readonly string[]): boolean {
	if (file.endsWith('.d.ts')) {
		return false;
	}
	return extensions.some((ext) => file.endsWith(CONVERTER_SUFFIX + ext));
}

async function listFiles(dir: string): Promise<string[]> {
	let entries: Dirent[];
	try {
		entries = await readdir(dir, { withFileTypes: true });
	} catch (error) {
		if (isMissing(error)) {
			return [];
		}
		throw error;
	}

	const files: string[] = [];
	for (const entry of entries) {
		const path = join(dir, entry.name);
		if (entry.isDirectory()) {
			files.push(...(await listFiles(path)));
		} else if (entry.isFile()) {
			files.push(path);
		}
	}
	return files;
}

async function resolveModuleFile(base: string, extensions: readonly string[]): Promise<string | undefined> {
	for (const ext of extensions) {
		const file = base + ext;
		try {
			if ((await stat(file)).isFile()) {
				return file;
			}
		} catch (error) {
			if (!isMissing(error)) {
				throw error;
			}
		}
	}
	return undefined;
}

async function importExports(file: string, typeName: string, ctx: LoadContext): Promise<Map<string, unknown>> {
	let mod: unknown;
	try {
		mod = await ctx.importModule(file);
	} catch (error) {
		throw new ConfigurationError(typeName, `failed to load ${file}`, { cause: error });
	}
	if (typeof mod !== 'object' || mod === null) {
		throw new ConfigurationError(typeName, `${file} did not load as a module`);
	}
	return new Map(Object.entries(mod));
}

function instantiate(candidate: Function, typeName: string): MappingConvert<unknown> {
	let instance: unknown;
	try {
		instance = Reflect.construct(candidate, []);
	} catch (error) {
		throw new ConfigurationError(typeName, `converter ${candidate.name} could not be instantiated`, { cause: error });
	}
	if (!isMappingConvert(instance)) {
		throw new ConfigurationError(typeName, `${candidate.name} does not implement MappingConvert`);
	}
	return instance;
}

function isMissing(error: unknown): boolean {
	return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
