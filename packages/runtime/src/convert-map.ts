import { getConvertName } from './constants';
import type { MappingConvert, RecordType } from './contract';
import { InvalidArgumentError, NotFoundError } from './errors';
import { buildRegistry, type RegistryOptions } from './registry-loader';
import type { ConverterRegistry } from './registry';

/**
 * Run-time entry point for bean ↔ map conversion.
 *
 * Wraps a built {@link ConverterRegistry}. Lookups are by exact class:
 * a subclass without its own converter is not found through its parent.
 *
 * @example
 * ```ts
 * const convert = await ConvertMap.create({ baseDir: './dist/generated' });
 *
 * const map = convert.toMap(user);               // { id: 1, userName: 'ada' }
 * const copy = convert.toBean({ id: 2 }, User);  // User { id: 2, ... }
 * ```
 */
export class ConvertMap {
	constructor(private readonly registry: ConverterRegistry) {}

	static async create(options: RegistryOptions): Promise<ConvertMap> {
		return new ConvertMap(await buildRegistry(options));
	}

	/**
	 * Converts a record to a map using the converter of `type`, or of the
	 * source's own class when no type is given. Falls back to `defaultType`
	 * when `type` has no converter.
	 */
	toMap<T extends object>(source: T | null | undefined, type?: RecordType<T> | null, defaultType?: RecordType<T>): Record<string, unknown> {
		if (source === null || source === undefined) {
			throw new InvalidArgumentError('source', 'cannot convert a null or undefined record');
		}
		// Undefined for a null-prototype record
		const ctor: unknown = source.constructor;
		const runtimeType = typeof ctor === 'function' ? ctor : undefined;

		const converter = type ? this.registry.get(type) : runtimeType && this.registry.find(runtimeType);
		if (converter) {
			return converter.toMap(source);
		}
		if (defaultType) {
			return this.require(defaultType).toMap(source);
		}
		throw new NotFoundError(type?.name ?? runtimeType?.name ?? 'Object');
	}

	/**
	 * Builds a record of `type` from a map. Keys are read by field name.
	 */
	toBean<T>(data: Readonly<Record<string, unknown>> | null | undefined, type: RecordType<T> | null | undefined, defaultType?: RecordType<T>): T {
		if (data === null || data === undefined) {
			throw new InvalidArgumentError('data', 'cannot convert a null or undefined map');
		}
		const target = type ?? defaultType;
		if (!target) {
			throw new InvalidArgumentError('type', 'a target type is required');
		}
		const converter = this.registry.get(target) ?? (defaultType ? this.registry.get(defaultType) : undefined);
		if (!converter) {
			throw new NotFoundError(target.name);
		}
		return converter.toBean(data);
	}

	exists(type: Function | null | undefined): boolean {
		return this.registry.has(type);
	}

	nonExists(type: Function | null | undefined): boolean {
		return !this.exists(type);
	}

	/**
	 * Converts each record in order. Stops at the first failure.
	 * Returns null for a null or undefined list.
	 */
	toMapList<T extends object>(sources: readonly T[] | null | undefined, type?: RecordType<T>): Record<string, unknown>[] | null {
		if (sources === null || sources === undefined) {
			return null;
		}
		return sources.map((source) => this.toMap(source, type));
	}

	/**
	 * Builds one record per map in order. Stops at the first failure.
	 * Returns null for a null or undefined list.
	 */
	toBeanList<T>(data: readonly Readonly<Record<string, unknown>>[] | null | undefined, type: RecordType<T> | null | undefined): T[] | null {
		if (data === null || data === undefined) {
			return null;
		}
		if (!type) {
			throw new InvalidArgumentError('type', 'a target type is required');
		}
		const converter = this.require(type);
		return data.map((item) => converter.toBean(item));
	}

	getMappingConvert<T>(type: RecordType<T>): MappingConvert<T> | undefined {
		return this.registry.get(type);
	}

	getRegisteredMap(): Map<Function, MappingConvert<unknown>> {
		return this.registry.entries();
	}

	getRegisteredConverterNames(): ReadonlySet<string> {
		return this.registry.converterNames();
	}

	getConvertName(type: Function | string | null | undefined): string | undefined {
		return getConvertName(type);
	}

	private require<T>(type: RecordType<T>): MappingConvert<T> {
		const converter = this.registry.get(type);
		if (!converter) {
			throw new NotFoundError(type.name);
		}
		return converter;
	}
}
