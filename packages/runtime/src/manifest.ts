import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Manifest written by the generator: declared type FQN → converter FQN.
 * An unversioned snapshot of one build.
 */
export const ManifestSchema = Type.Record(Type.String(), Type.String({ minLength: 1 }));

export type Manifest = Static<typeof ManifestSchema>;

export type ManifestParseResult = { ok: true; manifest: Manifest } | { ok: false; reason: string };

/**
 * A qualified name: `<module path>#<export name>`, e.g. `model/user#User`.
 */
export interface QualifiedName {
	readonly modulePath: string;
	readonly exportName: string;
}

export function formatQualifiedName(modulePath: string, exportName: string): string {
	return `${modulePath}#${exportName}`;
}

/**
 * Splits a qualified name at its last `#`. Returns undefined when either half is empty.
 */
export function parseQualifiedName(fqn: string): QualifiedName | undefined {
	const hash = fqn.lastIndexOf('#');
	if (hash <= 0 || hash === fqn.length - 1) {
		return undefined;
	}
	return { modulePath: fqn.slice(0, hash), exportName: fqn.slice(hash + 1) };
}

/**
 * Parses manifest text. Never throws: a blank, malformed or mistyped manifest
 * comes back as `{ ok: false }` with the reason.
 */
export function parseManifest(text: string): ManifestParseResult {
	if (text.trim() === '') {
		return { ok: false, reason: 'manifest is blank' };
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		return { ok: false, reason: `manifest is not valid JSON: ${error instanceof Error ? error.message : String(error)}` };
	}

	if (Array.isArray(parsed) || !Value.Check(ManifestSchema, parsed)) {
		const first = Array.isArray(parsed) ? undefined : Value.Errors(ManifestSchema, parsed).First();
		const where = first && first.path !== '' ? ` at ${first.path}` : '';
		return { ok: false, reason: `manifest does not map type names to converter names${where}` };
	}

	return { ok: true, manifest: parsed };
}

/**
 * JSON text of a manifest: two-space indent, trailing newline.
 */
export function serializeManifest(manifest: Manifest): string {
	return JSON.stringify(manifest, null, 2) + '\n';
}
