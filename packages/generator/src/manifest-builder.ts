import { posix } from 'node:path';
import type { FileSystemHost } from 'ts-morph';
import { Logger } from '@beanmap/logging';
import { MANIFEST_FILE_NAME, serializeManifest, type Manifest } from '@beanmap/runtime';

/**
 * Collects declared type → converter pairs during one generation pass and
 * writes them as the registry manifest when the pass ends.
 */
export class ManifestBuilder {
	private readonly entries = new Map<string, string>();
	private readonly log: Logger;

	constructor(logger?: Logger) {
		this.log = logger ?? new Logger('ManifestBuilder');
	}

	get size(): number {
		return this.entries.size;
	}

	/**
	 * Records a converter. A second entry for the same type replaces the first.
	 */
	add(sourceFqn: string, converterFqn: string): this {
		const previous = this.entries.get(sourceFqn);
		if (previous !== undefined && previous !== converterFqn) {
			this.log.debug('Manifest entry replaced', { source: sourceFqn, previous, converter: converterFqn });
		}
		this.entries.set(sourceFqn, converterFqn);
		return this;
	}

	/** Entries sorted by type name. */
	toManifest(): Manifest {
		const manifest: Manifest = {};
		for (const key of [...this.entries.keys()].sort()) {
			const value = this.entries.get(key);
			if (value !== undefined) {
				manifest[key] = value;
			}
		}
		return manifest;
	}

	serialize(): string {
		return serializeManifest(this.toManifest());
	}

	/**
	 * Writes `map-converter-registry.json` into `outDir`, even when empty.
	 * @returns The manifest path
	 */
	async write(fs: FileSystemHost, outDir: string): Promise<string> {
		const path = posix.join(outDir, MANIFEST_FILE_NAME);
		await fs.mkdir(outDir);
		await fs.writeFile(path, this.serialize());
		this.log.debug('Manifest written', { path, entries: this.entries.size });
		return path;
	}
}
