import type { ConfigProvider } from './types';
import { Logger } from '@beanmap/logging';

export type FailMode = 'error' | 'warn';

/**
 * Required config keys that were unset or blank when validated.
 */
export class MissingConfigError extends Error {
	public override readonly name = 'MissingConfigError';

	public constructor(public readonly keys: readonly string[]) {
		super(`Missing required config keys: ${keys.join(', ')}`);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, MissingConfigError);
		}
	}
}

/**
 * Loads a declared set of keys from any ConfigProvider in one pass and
 * serves them synchronously afterwards. Blank values count as unset.
 *
 * @example
 * ```ts
 * const config = await new ValidatedConfig(new EnvConfigProvider())
 *   .expectKeys('BEANMAP_REGISTRY_DIR')
 *   .allowKeys('BEANMAP_MANIFEST_PATH')
 *   .onFail('error')
 *   .validate();
 *
 * const dir = config.getRequiredSync('BEANMAP_REGISTRY_DIR');
 * ```
 */
export class ValidatedConfig implements ConfigProvider {
	private readonly log: Logger;
	private readonly required = new Set<string>();
	private readonly optional = new Set<string>();
	private readonly values = new Map<string, string | undefined>();
	private failMode: FailMode = 'warn';
	private validated = false;

	constructor(
		private readonly provider: ConfigProvider,
		logger?: Logger
	) {
		this.log = logger ?? new Logger('Config');
	}

	/** Keys that must hold a value. */
	expectKeys(...keys: string[]): this {
		for (const key of keys) {
			this.required.add(key);
		}
		return this;
	}

	/** Keys that may be unset but are still served by getSync(). */
	allowKeys(...keys: string[]): this {
		for (const key of keys) {
			this.optional.add(key);
		}
		return this;
	}

	/**
	 * - 'warn': log the missing keys and continue (default)
	 * - 'error': throw MissingConfigError
	 */
	onFail(mode: FailMode): this {
		this.failMode = mode;
		return this;
	}

	async validate(): Promise<this> {
		const keys = [...new Set([...this.required, ...this.optional])];
		const loaded = await this.provider.loadKeys(keys);

		this.values.clear();
		for (const key of keys) {
			const value = loaded[key];
			this.values.set(key, value === '' ? undefined : value);
		}

		const missing = [...this.required].filter((key) => this.values.get(key) === undefined);
		if (missing.length > 0) {
			if (this.failMode === 'error') {
				throw new MissingConfigError(missing);
			}
			this.log.warn('Missing required config keys', { missing });
		} else {
			this.log.debug('Config validated', { keys: keys.length });
		}

		this.validated = true;
		return this;
	}

	async get(key: string): Promise<string | undefined> {
		return this.provider.get(key);
	}

	async getRequired(key: string): Promise<string> {
		return this.provider.getRequired(key);
	}

	async loadKeys(keys: string[]): Promise<Record<string, string | undefined>> {
		return this.provider.loadKeys(keys);
	}

	/**
	 * @throws Error if validate() has not run or the key was never declared
	 */
	getSync(key: string): string | undefined {
		if (!this.validated) {
			throw new Error('Cannot use getSync() before validate() is called');
		}
		if (!this.values.has(key)) {
			throw new Error(`Key "${key}" was not declared - add it to expectKeys() or allowKeys()`);
		}
		return this.values.get(key);
	}

	getRequiredSync(key: string): string {
		const value = this.getSync(key);
		if (value === undefined) {
			throw new MissingConfigError([key]);
		}
		return value;
	}
}
