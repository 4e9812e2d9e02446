/**
 * Error taxonomy shared by the generator and the run-time registry.
 *
 * @example
 * ```typescript
 * throw new ConversionError('User', 'age', 'number', 'abc');
 * // ConversionError: [User.age] cannot assign value - expected number, got: "abc"
 * ```
 */

import { CONVERTER_SUFFIX } from './constants';

/**
 * Format a value for display in an error message.
 */
export function formatValue(value: unknown): string {
	if (value === null) {
		return 'null';
	}
	if (value === undefined) {
		return 'undefined';
	}
	if (typeof value === 'string') {
		return `"${value}"`;
	}
	if (typeof value === 'bigint') {
		return `${value}n`;
	}
	if (value instanceof Date) {
		return `Date(${value.toISOString()})`;
	}
	if (typeof value === 'object') {
		try {
			return JSON.stringify(value);
		} catch {
			return '[object]';
		}
	}
	return String(value);
}

/**
 * A converter cannot be generated or instantiated. Fatal for the build or
 * registry pass that raised it.
 */
export class ConfigurationError extends Error {
	public override readonly name = 'ConfigurationError';

	public constructor(
		public readonly typeName: string,
		public readonly reason: string,
		options?: { cause?: unknown }
	) {
		super(`Cannot configure converter for ${typeName}: ${reason}`, options);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, ConfigurationError);
		}
	}
}

/**
 * No converter is registered for the requested type.
 */
export class NotFoundError extends Error {
	public override readonly name = 'NotFoundError';

	public constructor(public readonly typeName: string) {
		super(`No converter registered for type ${typeName} (expected ${typeName}${CONVERTER_SUFFIX})`);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, NotFoundError);
		}
	}
}

/**
 * A map value does not match the declared type of the field it is assigned to.
 */
export class ConversionError extends Error {
	public override readonly name = 'ConversionError';

	/**
	 * @param typeName - Record class being built
	 * @param fieldName - Field that rejected the value
	 * @param expectedType - Declared type, as written in the record
	 * @param actualValue - The rejected value
	 */
	public constructor(
		public readonly typeName: string,
		public readonly fieldName: string,
		public readonly expectedType: string,
		public readonly actualValue: unknown
	) {
		super(`[${typeName}.${fieldName}] cannot assign value - expected ${expectedType}, got: ${formatValue(actualValue)}`);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, ConversionError);
		}
	}
}

/**
 * A required argument was null or undefined.
 */
export class InvalidArgumentError extends Error {
	public override readonly name = 'InvalidArgumentError';

	public constructor(
		public readonly argument: string,
		public readonly reason: string
	) {
		super(`Invalid argument '${argument}': ${reason}`);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, InvalidArgumentError);
		}
	}
}
