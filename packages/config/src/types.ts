/**
 * Configuration provider interface.
 *
 * The generator and the converter registry read their settings through a
 * provider so the source can be swapped: environment variables by default,
 * an in-memory map in tests, or a secrets store in a deployed service.
 *
 * @example
 * ```ts
 * const config = new EnvConfigProvider();
 * const outDir = (await config.get('BEANMAP_OUT_DIR')) ?? 'src/generated';
 * ```
 */
export interface ConfigProvider {
	/**
	 * Gets a configuration value by key.
	 * @returns The value, or undefined if not found
	 */
	get(key: string): Promise<string | undefined>;

	/**
	 * Gets a required configuration value.
	 * @throws Error if the value is not found or empty
	 */
	getRequired(key: string): Promise<string>;

	/**
	 * Loads multiple configuration values at once.
	 */
	loadKeys(keys: string[]): Promise<Record<string, string | undefined>>;
}
