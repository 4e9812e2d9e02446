/**
 * A record class that can be built with no arguments.
 */
export type RecordType<T = unknown> = new () => T;

/**
 * Bidirectional conversion between a record and a flat key/value map.
 * Implemented by every generated converter.
 */
export interface MappingConvert<T> {
	/** The record class this converter reads and builds; the registry keys on it. */
	readonly target: RecordType<T>;

	/** Qualified name of the marked declaration the converter was generated from. */
	readonly source?: string;

	/** Returns `{}` for a null or undefined entity. */
	toMap(entity: T | null | undefined): Record<string, unknown>;

	/** Returns a default-constructed record for an empty map. */
	toBean(data: Readonly<Record<string, unknown>>): T;
}

export function isMappingConvert(value: unknown): value is MappingConvert<unknown> {
	return (
		typeof value === 'object' &&
		value !== null &&
		'target' in value &&
		typeof value.target === 'function' &&
		'toMap' in value &&
		typeof value.toMap === 'function' &&
		'toBean' in value &&
		typeof value.toBean === 'function'
	);
}

/**
 * True for a class whose prototype carries toMap and toBean.
 */
export function isConverterClass(value: unknown): value is Function {
	if (typeof value !== 'function') {
		return false;
	}
	const prototype: unknown = value.prototype;
	return (
		typeof prototype === 'object' &&
		prototype !== null &&
		'toMap' in prototype &&
		typeof prototype.toMap === 'function' &&
		'toBean' in prototype &&
		typeof prototype.toBean === 'function'
	);
}

/**
 * Narrows a converter to the record type it was looked up by.
 */
export function convertsTo<T>(converter: MappingConvert<unknown>, type: RecordType<T>): converter is MappingConvert<T> {
	return converter.target === type;
}
