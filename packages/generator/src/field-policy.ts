import { MappingMethod } from '@beanmap/runtime';
import type { DirectionPolicy, FieldPolicy, ScannedField, ScannedRecord } from './types';

type Direction = typeof MappingMethod.TO_MAP | typeof MappingMethod.TO_BEAN;

const INCLUDED: DirectionPolicy = { include: true };

/**
 * Resolves toMap and toBean inclusion for every scanned field.
 *
 * Precedence, checked per direction: `@IgnoreToMap` / `@IgnoreToBean`, then
 * `@AutoKeyMapping({ ignore })`, then the record's `exclude` list. The first
 * that applies names the reason a field was left out.
 */
export function resolveFieldPolicies(record: ScannedRecord): FieldPolicy[] {
	const excluded = new Set(record.exclude);
	return record.fields.map((field) => ({
		field,
		toMap: resolveDirection(field, MappingMethod.TO_MAP, excluded),
		toBean: resolveDirection(field, MappingMethod.TO_BEAN, excluded),
		mapKey: mapKeyOf(field)
	}));
}

function resolveDirection(field: ScannedField, direction: Direction, excluded: ReadonlySet<string>): DirectionPolicy {
	const { markers } = field;
	if (direction === MappingMethod.TO_MAP ? markers.ignoreToMap : markers.ignoreToBean) {
		return { include: false, reason: 'direction-marker' };
	}

	const keyMapping = markers.keyMapping;
	if (keyMapping?.ignore && (keyMapping.method === MappingMethod.BOTH || keyMapping.method === direction)) {
		return { include: false, reason: 'key-mapping' };
	}

	if (excluded.has(field.name)) {
		return { include: false, reason: 'exclude-list' };
	}

	return INCLUDED;
}

function mapKeyOf(field: ScannedField): string {
	const target = field.markers.keyMapping?.target;
	return target !== undefined && target.trim() !== '' ? target : field.name;
}
