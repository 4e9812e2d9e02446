import { levels, getLevelName, isLevelEnabled, type LevelNumber } from './levels';
import { consoleTransport } from './transports/console';
import type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions } from './types';

export type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions };

/**
 * Structured logger used by the generator and the converter registry.
 *
 * - Produces structured log objects
 * - Writes synchronously to configurable transports
 * - Immutable context via with()
 */
export class Logger {
	private static globalTransports: Transport[] | null = null;
	private static globalLevel: LevelNumber = levels.info;

	private readonly name: string;
	private readonly level: LevelNumber | null;
	private readonly explicitTransports: Transport[] | null;
	private readonly context: Record<string, unknown>;

	constructor(name: string, options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
		this.name = name;
		// null means "follow the global level", resolved at write time
		this.level = options.level ? levels[options.level] : null;
		this.explicitTransports = options.transports ?? null;
		this.context = context;
	}

	/**
	 * Configure global defaults for all Logger instances.
	 * Loggers created before this call pick the new settings up on their next write.
	 */
	static configure(options: LoggerGlobalOptions): void {
		if (options.level) {
			Logger.globalLevel = levels[options.level];
		}
		if (options.transports) {
			Logger.globalTransports = options.transports;
		}
	}

	/**
	 * Reset global configuration to defaults.
	 *
	 * Tests that call Logger.configure() must call this in afterEach().
	 */
	static reset(): void {
		Logger.globalLevel = levels.info;
		Logger.globalTransports = null;
	}

	/**
	 * Flush and close the global transports.
	 *
	 * Uses Promise.allSettled so one failing transport cannot keep the others open.
	 */
	static async shutdown(): Promise<void> {
		const transports = Logger.globalTransports ?? [];
		await Promise.allSettled(transports.map((transport) => transport.flush()));
		await Promise.allSettled(transports.map((transport) => transport.close()));
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.debug, msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.info, msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.warn, msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.error, msg, data);
	}

	/**
	 * Creates a new logger with additional context (immutable)
	 */
	with(data: Record<string, unknown>): Logger {
		return new Logger(this.name, this.inheritedOptions(), { ...this.context, ...data });
	}

	/**
	 * Creates a child logger with a new name (immutable).
	 * Inherits context, level, and transports from parent.
	 */
	child(name: string): Logger {
		return new Logger(name, this.inheritedOptions(), { ...this.context });
	}

	private inheritedOptions(): LoggerOptions {
		const options: LoggerOptions = {};
		if (this.level !== null) {
			options.level = getLevelName(this.level);
		}
		if (this.explicitTransports) {
			options.transports = this.explicitTransports;
		}
		return options;
	}

	private get transports(): Transport[] {
		return this.explicitTransports ?? Logger.globalTransports ?? [consoleTransport()];
	}

	private log(level: LevelNumber, msg: string, data?: Record<string, unknown>): void {
		if (!isLevelEnabled(level, this.level ?? Logger.globalLevel)) {
			return;
		}

		const logObj: LogObject = {
			time: Date.now(),
			level,
			msg,
			name: this.name,
			...this.context,
			...data
		};

		for (const transport of this.transports) {
			transport.write(logObj);
		}
	}
}
