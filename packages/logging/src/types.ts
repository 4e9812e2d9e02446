/**
 * Shared logging types.
 */

export type LevelName = 'debug' | 'info' | 'warn' | 'error';

export type LevelNumber = 10 | 20 | 30 | 40;

/**
 * Structured log record handed to transports.
 */
export interface LogObject {
	time: number;
	level: LevelNumber;
	msg: string;
	name?: string;
	[key: string]: unknown;
}

/**
 * Destination for log records.
 */
export interface Transport {
	write(obj: LogObject): void;
	flush(): Promise<void>;
	close(): Promise<void>;
}

export interface LoggerOptions {
	level?: LevelName;
	transports?: Transport[];
}

/**
 * Options accepted by Logger.configure().
 */
export interface LoggerGlobalOptions {
	level?: LevelName;
	transports?: Transport[];
}
