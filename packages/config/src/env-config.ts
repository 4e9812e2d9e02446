import type { ConfigProvider } from './types';

/**
 * Configuration provider that reads from environment variables.
 *
 * Reads `process.env` unless another environment object is supplied,
 * which keeps tests away from the real process environment.
 *
 * @example
 * ```ts
 * const config = new EnvConfigProvider();
 * const registryDir = await config.getRequired('BEANMAP_REGISTRY_DIR');
 * ```
 */
export class EnvConfigProvider implements ConfigProvider {
	constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

	async get(key: string): Promise<string | undefined> {
		return this.env[key];
	}

	/**
	 * @throws Error if the variable is not set or empty
	 */
	async getRequired(key: string): Promise<string> {
		const value = this.env[key];
		if (value === undefined || value === '') {
			throw new Error(`Required config '${key}' is not set. Add it to your environment.`);
		}
		return value;
	}

	async loadKeys(keys: string[]): Promise<Record<string, string | undefined>> {
		const result: Record<string, string | undefined> = {};
		for (const key of keys) {
			result[key] = this.env[key];
		}
		return result;
	}
}
