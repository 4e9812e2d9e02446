import { Logger } from '@beanmap/logging';
import { convertsTo, type MappingConvert, type RecordType } from './contract';
import { getConvertName } from './constants';

/**
 * Immutable lookup from a record class to its live converter.
 *
 * Built once and never mutated afterwards, so it can be shared freely.
 * Keys are the converters' `target` classes: a stable type identifier that
 * also finds redirect converters by the record they actually convert.
 */
export class ConverterRegistry {
	private static readonly EMPTY = new ConverterRegistry(new Map());

	private constructor(private readonly converters: ReadonlyMap<Function, MappingConvert<unknown>>) {}

	static empty(): ConverterRegistry {
		return ConverterRegistry.EMPTY;
	}

	/**
	 * Builds a registry from converter instances. When two converters share a
	 * target the first one is kept and the later one dropped.
	 */
	static of(converters: Iterable<MappingConvert<unknown>>, logger?: Logger): ConverterRegistry {
		const log = logger ?? new Logger('ConverterRegistry');
		const map = new Map<Function, MappingConvert<unknown>>();

		for (const converter of converters) {
			const existing = map.get(converter.target);
			if (existing) {
				log.debug('Duplicate converter discarded', {
					target: converter.target.name,
					kept: existing.constructor.name,
					discarded: converter.constructor.name
				});
				continue;
			}
			map.set(converter.target, converter);
		}

		return map.size === 0 ? ConverterRegistry.EMPTY : new ConverterRegistry(map);
	}

	get size(): number {
		return this.converters.size;
	}

	/**
	 * Converter for exactly this class; subclasses are not matched.
	 */
	get<T>(type: RecordType<T>): MappingConvert<T> | undefined {
		const converter = this.converters.get(type);
		return converter && convertsTo(converter, type) ? converter : undefined;
	}

	/**
	 * Lookup by any constructor, such as the one read from an instance.
	 */
	find(type: Function): MappingConvert<unknown> | undefined {
		return this.converters.get(type);
	}

	has(type: Function | null | undefined): boolean {
		return type !== null && type !== undefined && this.converters.has(type);
	}

	/**
	 * A copy of the lookup table; changes to it do not reach the registry.
	 */
	entries(): Map<Function, MappingConvert<unknown>> {
		return new Map(this.converters);
	}

	/**
	 * `<Name>_MapConverter` for every registered record class.
	 */
	converterNames(): ReadonlySet<string> {
		const names = new Set<string>();
		for (const type of this.converters.keys()) {
			const name = getConvertName(type);
			if (name) {
				names.add(name);
			}
		}
		return names;
	}
}
