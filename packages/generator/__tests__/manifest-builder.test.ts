import { describe, expect, test } from 'vitest';
import { Project } from 'ts-morph';
import { ManifestBuilder } from '../src/index';
import { captureLogger } from './helpers';

describe('ManifestBuilder', () => {
	test('should sort entries by type name', () => {
		const builder = new ManifestBuilder(captureLogger().logger)
			.add('model/user#User', 'auto-mappings/model/User_MapConverter#User_MapConverter')
			.add('model/order#Order', 'auto-mappings/model/Order_MapConverter#Order_MapConverter');

		expect(Object.keys(builder.toManifest())).toEqual(['model/order#Order', 'model/user#User']);
	});

	test('should replace an entry added twice', () => {
		const { logger, logs } = captureLogger();
		const builder = new ManifestBuilder(logger).add('a#A', 'x#X').add('a#A', 'y#Y');

		expect(builder.size).toBe(1);
		expect(builder.toManifest()).toEqual({ 'a#A': 'y#Y' });
		expect(logs[0]).toMatchObject({ msg: 'Manifest entry replaced', previous: 'x#X', converter: 'y#Y' });
	});

	test('should serialize as indented JSON', () => {
		const builder = new ManifestBuilder(captureLogger().logger).add('a#A', 'b#B');

		expect(builder.serialize()).toBe('{\n  "a#A": "b#B"\n}\n');
	});

	test('should write the manifest even when empty', async () => {
		const fs = new Project({ useInMemoryFileSystem: true }).getFileSystem();
		const path = await new ManifestBuilder(captureLogger().logger).write(fs, '/out');

		expect(path).toBe('/out/map-converter-registry.json');
		expect(fs.readFileSync(path)).toBe('{}\n');
	});
});
