/**
 * Configuration Layer Loader
 * ==========================
 * Reads the configuration layers from disk and the process environment,
 * in precedence order (lowest first):
 * 1. defaults          - config/defaults.json (required base layer)
 * 2. example-template  - .env.example
 * 3. environment       - process environment, only keys known to the layers above
 * 4. user-override     - .env, then an optional JSON override file
 *
 * Missing optional files are skipped. A missing defaults file yields no base
 * layer, which the resolver reports as MissingBaseLayer.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { ConfigError } from '../lib/errors';
import type { Logger } from '../logging/logger';
import { ComponentLogger } from '../logging/component-logger';
import { BASE_LAYER, CONFIG_KEYS, TEMPLATE_LAYER, type ConfigLayer, type ConfigValue, type ConfigValues } from './types';

export interface ConfigLoaderOptions {
	/** Directory holding defaults.json */
	configDir: string;
	/** Directory holding .env.example and .env (default: configDir's parent) */
	projectDir?: string;
	/** JSON file applied last */
	overrideFile?: string;
	env?: NodeJS.ProcessEnv;
}

export class ConfigLoader {
	private readonly configDir: string;
	private readonly projectDir: string;
	private readonly overrideFile?: string;
	private readonly env: NodeJS.ProcessEnv;
	private readonly log: ComponentLogger;

	constructor(options: ConfigLoaderOptions, logger?: Logger) {
		this.configDir = options.configDir;
		this.projectDir = options.projectDir ?? path.dirname(path.resolve(options.configDir));
		this.overrideFile = options.overrideFile;
		this.env = options.env ?? process.env;
		this.log = new ComponentLogger(logger, 'ConfigLoader');
	}

	/**
	 * Load every available layer in precedence order
	 */
	public loadLayers(): ConfigLayer[] {
		const layers: ConfigLayer[] = [];

		const defaults = this.loadDefaultsLayer();
		if (defaults) {
			layers.push(defaults);
		}

		const template = this.loadTemplateLayer();
		if (template) {
			layers.push(template);
		}

		const knownKeys = new Set<string>([
			...Object.values(CONFIG_KEYS),
			...layers.flatMap((layer) => Object.keys(layer.values)),
		]);
		layers.push(this.loadEnvironmentLayer(knownKeys));

		const override = this.loadOverrideLayer();
		if (override) {
			layers.push(override);
		}

		this.log.infoSync('Configuration layers loaded', {
			layers: layers.map((layer) => `${layer.name}(${Object.keys(layer.values).length})`),
		});

		return layers;
	}

	public loadDefaultsLayer(): ConfigLayer | undefined {
		const file = path.join(this.configDir, 'defaults.json');
		const values = readJsonObject(file);
		return values ? { name: BASE_LAYER, values } : undefined;
	}

	public loadTemplateLayer(): ConfigLayer | undefined {
		const values = readEnvFile(path.join(this.projectDir, '.env.example'));
		return values ? { name: TEMPLATE_LAYER, values } : undefined;
	}

	public loadEnvironmentLayer(knownKeys: ReadonlySet<string>): ConfigLayer {
		const values: ConfigValues = {};
		for (const key of knownKeys) {
			const value = this.env[key];
			if (value !== undefined) {
				values[key] = value;
			}
		}
		return { name: 'environment', values };
	}

	public loadOverrideLayer(): ConfigLayer | undefined {
		const fromEnvFile = readEnvFile(path.join(this.projectDir, '.env'));
		const fromJson = this.overrideFile ? readJsonObject(this.overrideFile) : undefined;

		if (this.overrideFile && !fromJson) {
			this.log.warnSync('Override file not found', { file: this.overrideFile });
		}

		if (!fromEnvFile && !fromJson) {
			return undefined;
		}

		return {
			name: 'user-override',
			values: { ...fromEnvFile, ...fromJson },
		};
	}
}

// ========================================================================
// Helpers
// ========================================================================

function readEnvFile(file: string): ConfigValues | undefined {
	if (!fs.existsSync(file)) {
		return undefined;
	}
	return dotenv.parse(fs.readFileSync(file, 'utf-8'));
}

function readJsonObject(file: string): ConfigValues | undefined {
	if (!fs.existsSync(file)) {
		return undefined;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
	} catch (error) {
		throw new ConfigError('InvalidValue', `${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, [file]);
	}

	if (!isConfigObject(parsed)) {
		throw new ConfigError('InvalidValue', `${file} must contain a JSON object`, [file]);
	}
	return parsed;
}

function isConfigObject(value: unknown): value is ConfigValues {
	return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.values(value).every(isConfigValue);
}

function isConfigValue(value: unknown): value is ConfigValue {
	if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
		return true;
	}
	if (Array.isArray(value)) {
		return value.every(isConfigValue);
	}
	return isConfigObject(value);
}
