import type { RecordType } from './contract';

/**
 * Conversion direction a field-level policy applies to.
 */
export const MappingMethod = {
	BOTH: 'BOTH',
	TO_MAP: 'TO_MAP',
	TO_BEAN: 'TO_BEAN'
} as const;

export type MappingMethod = (typeof MappingMethod)[keyof typeof MappingMethod];

export interface AutoToMapOptions {
	/** Field names left out of the generated converter entirely. */
	readonly exclude?: readonly string[];
	/** Generate the converter for this record's shape instead of the marked class. */
	readonly mapping?: RecordType<unknown>;
}

export interface AutoKeyMappingOptions {
	readonly ignore?: boolean;
	readonly method?: MappingMethod;
	/** Key written by toMap. toBean still reads the field's own name. */
	readonly target?: string;
}

/**
 * Decorator signature shared by every marker. Markers are read from source by
 * the generator and do nothing when the decorated class is loaded.
 */
export type Marker = (...decorated: unknown[]) => void;

const noop: Marker = () => {};

/**
 * Marks a class for converter generation.
 *
 * @example
 * ```ts
 * @AutoToMap({ exclude: ['password'] })
 * export class User {
 *   name = '';
 *   password = '';
 * }
 * ```
 */
export function AutoToMap(_options: AutoToMapOptions = {}): Marker {
	return noop;
}

/** Leaves the field out of toMap. */
export function IgnoreToMap(): Marker {
	return noop;
}

/** Leaves the field out of toBean. */
export function IgnoreToBean(): Marker {
	return noop;
}

/**
 * Per-field policy: ignore in one or both directions, or rename the toMap key.
 *
 * @example
 * ```ts
 * @AutoKeyMapping({ target: 'userName' })
 * name = '';
 * ```
 */
export function AutoKeyMapping(_options: AutoKeyMappingOptions = {}): Marker {
	return noop;
}
