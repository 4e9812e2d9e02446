/** Suffix of every generated converter class name. */
export const CONVERTER_SUFFIX = '_MapConverter';

/** Infix used when a marked class redirects its converter to another record. */
export const REDIRECT_INFIX = '_mapping_';

/** Directory, relative to the generated root, holding every converter module. */
export const CONVERTER_NAMESPACE = 'auto-mappings';

/** Manifest file written next to the converter namespace. */
export const MANIFEST_FILE_NAME = 'map-converter-registry.json';

/**
 * Converter name for a class or a class name: `User` → `User_MapConverter`.
 * Returns undefined for a blank name.
 */
export function getConvertName(type: Function | string | null | undefined): string | undefined {
	const name = typeof type === 'function' ? type.name : type;
	if (name === undefined || name === null || name.trim() === '') {
		return undefined;
	}
	return name + CONVERTER_SUFFIX;
}
