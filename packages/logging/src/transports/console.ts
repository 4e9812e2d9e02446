import { inspect } from 'node:util';
import type { Transport, LogObject, LevelNumber } from '../types';

export interface ConsoleTransportOptions {
	pretty?: boolean;
	json?: boolean;
	/** Depth for object inspection (default: 4) */
	depth?: number;
	/** Show colors in pretty mode (default: auto-detect TTY) */
	colors?: boolean;
	/** Output sink, defaults to console.log */
	write?: (line: string) => void;
}

export const ANSI_COLORS = {
	reset: '\x1b[0m',
	gray: '\x1b[90m',
	red: '\x1b[31m',
	yellow: '\x1b[33m',
	magenta: '\x1b[35m',
	cyan: '\x1b[36m',
	white: '\x1b[37m'
} as const;

const levelColors: Record<LevelNumber, string> = {
	10: ANSI_COLORS.magenta,
	20: ANSI_COLORS.cyan,
	30: ANSI_COLORS.yellow,
	40: ANSI_COLORS.red
};

const levelChars: Record<LevelNumber, string> = {
	10: 'D',
	20: 'I',
	30: 'W',
	40: 'E'
};

export interface FormatOptions {
	colors: boolean;
	depth: number;
}

function paint(text: string, color: string, options: FormatOptions): string {
	return options.colors ? `${color}${text}${ANSI_COLORS.reset}` : text;
}

function formatTime(timestamp: number): string {
	const date = new Date(timestamp);
	const hours = date.getHours().toString().padStart(2, '0');
	const minutes = date.getMinutes().toString().padStart(2, '0');
	const seconds = date.getSeconds().toString().padStart(2, '0');
	return `${hours}:${minutes}:${seconds}`;
}

function formatValue(value: unknown, options: FormatOptions): string {
	if (typeof value === 'string') {
		return value;
	}
	if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
		return String(value);
	}
	return inspect(value, { colors: options.colors, depth: options.depth, breakLength: Infinity });
}

/**
 * Pretty line: `HH:MM:SS:L:Name message: key:value key:value`
 */
export function formatPretty(obj: LogObject, options: FormatOptions): string {
	const { time, level, msg, name, error, err, ...context } = obj;
	const levelChar = levelChars[level] ?? '?';

	const contextParts = Object.entries(context).map(([key, value]) => `${key}:${formatValue(value, options)}`);
	const contextStr = contextParts.length > 0 ? `: ${contextParts.join(' ')}` : '';

	const message = level === 40 ? paint(msg, ANSI_COLORS.red, options) : level === 30 ? paint(msg, ANSI_COLORS.yellow, options) : msg;

	let output = `${paint(formatTime(time), ANSI_COLORS.gray, options)}:${paint(levelChar, levelColors[level], options)}:${paint(name ?? 'Application', ANSI_COLORS.yellow, options)} ${message}${contextStr}`;

	const errorObj = error ?? err;
	if (errorObj instanceof Error) {
		output += '\n' + inspect(errorObj, { colors: options.colors, depth: options.depth });
	}

	return output;
}

function formatJson(obj: LogObject): string {
	return JSON.stringify(obj, (_key, value: unknown) =>
		value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value
	);
}

function isPrettyMode(options: ConsoleTransportOptions): boolean {
	if (options.pretty !== undefined) return options.pretty;
	if (options.json !== undefined) return !options.json;
	return process.env.NODE_ENV !== 'production';
}

/**
 * Console transport - outputs to stdout with pretty or JSON formatting.
 *
 * @example
 * ```ts
 * consoleTransport()                                  // auto-detect
 * consoleTransport({ pretty: true, colors: true })
 * consoleTransport({ json: true })
 * ```
 */
export function consoleTransport(options: ConsoleTransportOptions = {}): Transport {
	const pretty = isPrettyMode(options);
	const formatOptions: FormatOptions = {
		colors: options.colors ?? process.stdout.isTTY ?? false,
		depth: options.depth ?? 4
	};
	const sink = options.write ?? ((line: string) => console.log(line));

	return {
		write(obj: LogObject): void {
			sink(pretty ? formatPretty(obj, formatOptions) : formatJson(obj));
		},

		async flush(): Promise<void> {
			// Console writes are synchronous
		},

		async close(): Promise<void> {
			// Nothing to release
		}
	};
}
