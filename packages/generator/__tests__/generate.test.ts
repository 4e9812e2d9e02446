import { describe, expect, test } from 'vitest';
import { ConfigurationError, parseManifest } from '@beanmap/runtime';
import { generateConverters } from '../src/index';
import { captureLogger, createProject, MODEL_FILES } from './helpers';

const ACCOUNT_SOURCE = `
import { User } from '../model/user';
@AutoToMap({ mapping: User })
export class Account {}
`;

describe('generateConverters', () => {
	test('should write one converter per marked class and the manifest', async () => {
		const project = createProject({ ...MODEL_FILES, '/src/api/account.ts': ACCOUNT_SOURCE });
		const { logger } = captureLogger();

		const result = await generateConverters({ project, rootDir: '/src', outDir: '/src/generated', logger });
		const fs = project.getFileSystem();

		expect(result.artifacts.map((artifact) => artifact.className)).toEqual([
			'Account_mapping_User_MapConverter',
			'User_MapConverter'
		]);
		expect(result.manifest).toEqual({
			'api/account#Account': 'auto-mappings/model/Account_mapping_User_MapConverter#Account_mapping_User_MapConverter',
			'model/user#User': 'auto-mappings/model/User_MapConverter#User_MapConverter'
		});
		expect(result.manifestPath).toBe('/src/generated/map-converter-registry.json');
		expect(parseManifest(fs.readFileSync(result.manifestPath))).toEqual({ ok: true, manifest: result.manifest });
		for (const artifact of result.artifacts) {
			expect(fs.readFileSync(artifact.filePath)).toBe(artifact.text);
		}
	});

	test('should resolve relative directories against the project directory', async () => {
		const project = createProject(MODEL_FILES);

		const result = await generateConverters({ project, rootDir: 'src', outDir: 'src/generated', logger: captureLogger().logger });

		expect(result.artifacts[0]?.filePath).toBe('/src/generated/auto-mappings/model/User_MapConverter.ts');
	});

	test('should write an empty manifest when nothing is marked', async () => {
		const project = createProject({ '/src/plain.ts': 'export class Plain { id = 0; }' });

		const result = await generateConverters({ project, rootDir: '/src', outDir: '/src/generated', logger: captureLogger().logger });

		expect(result.artifacts).toEqual([]);
		expect(project.getFileSystem().readFileSync('/src/generated/map-converter-registry.json')).toBe('{}\n');
	});

	test('should not write anything when write is false', async () => {
		const project = createProject(MODEL_FILES);

		const result = await generateConverters({
			project,
			rootDir: '/src',
			outDir: '/src/generated',
			write: false,
			logger: captureLogger().logger
		});

		expect(result.artifacts).toHaveLength(1);
		expect(project.getFileSystem().fileExistsSync(result.manifestPath)).toBe(false);
	});

	test('should not scan the output directory', async () => {
		const project = createProject({
			...MODEL_FILES,
			'/src/generated/stale.ts': '@AutoToMap()\nexport class Stale { id = 0; }'
		});

		const result = await generateConverters({ project, rootDir: '/src', outDir: '/src/generated', logger: captureLogger().logger });

		expect(Object.keys(result.manifest)).toEqual(['model/user#User']);
	});

	test('should produce identical output on a second run', async () => {
		const first = await generateConverters({
			project: createProject(MODEL_FILES),
			rootDir: '/src',
			outDir: '/src/generated',
			logger: captureLogger().logger
		});
		const second = await generateConverters({
			project: createProject(MODEL_FILES),
			rootDir: '/src',
			outDir: '/src/generated',
			logger: captureLogger().logger
		});

		expect(second.artifacts.map((artifact) => artifact.text)).toEqual(first.artifacts.map((artifact) => artifact.text));
	});

	test('should reject two records that generate the same converter', async () => {
		const project = createProject({
			'/src/model/a.ts': '@AutoToMap()\nexport class Same { id = 0; }',
			'/src/model/b.ts': '@AutoToMap()\nexport class Same { id = 0; }'
		});

		const pending = generateConverters({ project, rootDir: '/src', outDir: '/src/generated', logger: captureLogger().logger });

		await expect(pending).rejects.toThrow(ConfigurationError);
		await expect(pending).rejects.toThrow(
			'Cannot configure converter for model/b#Same: Same_MapConverter is already generated for model/a#Same'
		);
	});

	test('should log each converter and a summary', async () => {
		const { logger, logs } = captureLogger();

		await generateConverters({ project: createProject(MODEL_FILES), rootDir: '/src', outDir: '/src/generated', logger });

		expect(logs.find((entry) => entry.msg === 'Generated converter')).toMatchObject({
			name: 'Generator',
			converter: 'User_MapConverter',
			source: 'model/user#User',
			toMap: 10,
			toBean: 9
		});
		expect(logs.find((entry) => entry.msg === 'Generation complete')).toMatchObject({
			converters: 1,
			manifestPath: '/src/generated/map-converter-registry.json'
		});
	});
});
