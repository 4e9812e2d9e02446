import { posix } from 'node:path';
import { Project } from 'ts-morph';
import { Logger } from '@beanmap/logging';
import { ConfigurationError, MANIFEST_FILE_NAME, type Manifest } from '@beanmap/runtime';
import { emitConverter, type ImportExtension } from './converter-emitter';
import { DeclarationScanner } from './declaration-scanner';
import { resolveFieldPolicies } from './field-policy';
import { ManifestBuilder } from './manifest-builder';
import type { ConverterArtifact } from './types';

export interface GenerateOptions {
	/** Project holding the sources; built from `tsConfigFilePath` when absent. */
	project?: Project;
	tsConfigFilePath?: string;
	/** Directory qualified names are relative to. */
	rootDir: string;
	/** Directory converters and the manifest are written to; never scanned. */
	outDir: string;
	runtimeModule?: string;
	importExtension?: ImportExtension;
	/** Write artifacts to the project's file system (default true). */
	write?: boolean;
	logger?: Logger;
}

export interface GenerateResult {
	artifacts: ConverterArtifact[];
	manifest: Manifest;
	manifestPath: string;
}

export const DEFAULT_RUNTIME_MODULE = '@beanmap/runtime';

/**
 * Runs one generation pass: scan, resolve field policies, emit a converter
 * per marked class, then write the manifest.
 *
 * @example
 * ```ts
 * const { artifacts } = await generateConverters({
 *   tsConfigFilePath: 'tsconfig.json',
 *   rootDir: 'src',
 *   outDir: 'src/generated'
 * });
 * ```
 */
export async function generateConverters(options: GenerateOptions): Promise<GenerateResult> {
	const log = options.logger ?? new Logger('Generator');
	const started = performance.now();
	const project = options.project ?? new Project({ tsConfigFilePath: options.tsConfigFilePath ?? 'tsconfig.json' });
	const fs = project.getFileSystem();
	const cwd = fs.getCurrentDirectory();
	const rootDir = posix.resolve(cwd, options.rootDir);
	const outDir = posix.resolve(cwd, options.outDir);

	const scanner = new DeclarationScanner(project, { rootDir, ignoreDirs: [outDir], logger: log.child('DeclarationScanner') });
	const manifest = new ManifestBuilder(log.child('ManifestBuilder'));
	const artifacts: ConverterArtifact[] = [];
	const written = new Map<string, string>();

	for (const record of scanner.scan()) {
		const policies = resolveFieldPolicies(record);
		const artifact = emitConverter(record, policies, {
			outDir,
			runtimeModule: options.runtimeModule ?? DEFAULT_RUNTIME_MODULE,
			importExtension: options.importExtension ?? ''
		});

		const clash = written.get(artifact.filePath);
		if (clash !== undefined) {
			throw new ConfigurationError(record.marked.fqn, `${artifact.className} is already generated for ${clash}`);
		}
		written.set(artifact.filePath, record.marked.fqn);

		artifacts.push(artifact);
		manifest.add(artifact.sourceFqn, artifact.fqn);
		log.info('Generated converter', {
			converter: artifact.className,
			source: artifact.sourceFqn,
			toMap: policies.filter((policy) => policy.toMap.include).length,
			toBean: policies.filter((policy) => policy.toBean.include).length
		});
	}

	let manifestPath = posix.join(outDir, MANIFEST_FILE_NAME);
	if (options.write ?? true) {
		for (const artifact of artifacts) {
			await fs.mkdir(posix.dirname(artifact.filePath));
			await fs.writeFile(artifact.filePath, artifact.text);
		}
		manifestPath = await manifest.write(fs, outDir);
	}

	log.info('Generation complete', {
		converters: artifacts.length,
		manifestPath,
		durationMs: Math.round(performance.now() - started)
	});

	return { artifacts, manifest: manifest.toManifest(), manifestPath };
}
