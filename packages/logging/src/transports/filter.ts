import type { Transport, LogObject } from '../types';

/** Decides whether a record reaches the wrapped transport. */
export type LogFilter = (obj: LogObject) => boolean;

export interface FilterOptions {
	/** Only these logger names pass (empty = all) */
	includeNames?: readonly string[];
	/** These logger names never pass */
	excludeNames?: readonly string[];
}

/**
 * Filter on logger names. Records without a name always pass.
 *
 * @example
 * ```ts
 * // Generator summary lines only, without the scanner's per-record output
 * byName({ includeNames: ['Generator'] })
 * ```
 */
export function byName(options: FilterOptions): LogFilter {
	const include = new Set(options.includeNames ?? []);
	const exclude = new Set(options.excludeNames ?? []);

	return (obj) => {
		if (obj.name === undefined) {
			return true;
		}
		return (include.size === 0 || include.has(obj.name)) && !exclude.has(obj.name);
	};
}

/**
 * Wraps a transport so only records accepted by `accept` are written.
 */
export function filterTransport(transport: Transport, accept: LogFilter): Transport {
	return {
		write(obj: LogObject): void {
			if (accept(obj)) {
				transport.write(obj);
			}
		},
		flush: () => transport.flush(),
		close: () => transport.close()
	};
}
