import type { MappingMethod } from '@beanmap/runtime';

export type PrimitiveName = 'string' | 'number' | 'boolean' | 'bigint' | 'symbol' | 'function';

/**
 * One way a value may satisfy a field's declared type.
 */
export type ValueCheck =
	| { readonly kind: 'typeof'; readonly type: PrimitiveName }
	| { readonly kind: 'array' }
	| { readonly kind: 'instanceof'; readonly className: string; readonly importFrom?: string }
	| { readonly kind: 'object' };

/**
 * Run-time check emitted for a field in toBean.
 *
 * `unchecked` fields (any, unknown, type parameters) are assigned as-is.
 * Otherwise the value passes when it matches any alternative, or is null
 * and the field is nullable.
 */
export interface FieldCheck {
	readonly unchecked: boolean;
	readonly nullable: boolean;
	readonly alternatives: readonly ValueCheck[];
	/** Declared type is exactly one primitive, so a passing value needs no cast. */
	readonly exact: boolean;
}

export interface KeyMapping {
	readonly ignore: boolean;
	readonly method: MappingMethod;
	readonly target?: string;
}

export interface FieldMarkers {
	readonly ignoreToMap: boolean;
	readonly ignoreToBean: boolean;
	readonly keyMapping?: KeyMapping;
}

export interface ScannedField {
	readonly name: string;
	/** Declared type as written, used in conversion errors. */
	readonly typeText: string;
	readonly check: FieldCheck;
	readonly declaringClass: string;
	readonly markers: FieldMarkers;
}

export interface ClassRef {
	readonly name: string;
	/** Absolute path of the declaring source file. */
	readonly filePath: string;
	/** `<module path>#<name>` relative to the root dir. */
	readonly fqn: string;
	/** Directory of the module relative to the root dir, `''` at the root. */
	readonly moduleDir: string;
}

/**
 * A class carrying `@AutoToMap`, with the record its converter is built for.
 */
export interface ScannedRecord {
	readonly marked: ClassRef;
	/** The record converted: the `mapping` target, or the marked class itself. */
	readonly record: ClassRef;
	readonly exclude: readonly string[];
	/** Own fields first, then each ancestor's. */
	readonly fields: readonly ScannedField[];
}

export type ExclusionReason = 'direction-marker' | 'key-mapping' | 'exclude-list';

export type DirectionPolicy = { readonly include: true } | { readonly include: false; readonly reason: ExclusionReason };

export interface FieldPolicy {
	readonly field: ScannedField;
	readonly toMap: DirectionPolicy;
	readonly toBean: DirectionPolicy;
	/** Key written by toMap. toBean reads the field name. */
	readonly mapKey: string;
}

export interface ConverterArtifact {
	readonly className: string;
	/** Absolute path the module is written to. */
	readonly filePath: string;
	/** `auto-mappings/<dir>/<className>#<className>` */
	readonly fqn: string;
	/** FQN of the marked class the manifest keys on. */
	readonly sourceFqn: string;
	readonly text: string;
}
