/**
 * CONFIG RESOLVER
 * ===============
 *
 * Merges ordered configuration layers (defaults < example-template <
 * environment < user-override) into one immutable ConfigSnapshot.
 *
 * Merge rule is last-writer-wins per key. The resolver does no I/O: layers
 * arrive already loaded (see config-loader.ts).
 */

import _ from 'lodash';
import type { z } from 'zod';
import { ConfigError } from '../lib/errors';
import type { Logger } from '../logging/logger';
import { ComponentLogger } from '../logging/component-logger';
import type { HealthCheckDescriptor } from '../health/types';
import { Topology } from './topology';
import {
	BASE_LAYER,
	CONFIG_KEYS,
	ExternalDependencyInputSchema,
	SETTINGS_KEYS,
	SettingsSchema,
	TEMPLATE_LAYER,
	TopologyInputSchema,
	type ConfigIssue,
	type ConfigLayer,
	type ConfigValue,
	type ConfigValues,
	type ExternalDependencyInput,
	type HealthCheckInput,
	type ReconcilerSettings,
	type ServiceSpec,
	type ServiceSpecInput,
} from './types';

export interface ConfigSnapshot {
	/** Names of the applied layers, in precedence order */
	readonly layers: readonly string[];
	readonly values: Readonly<ConfigValues>;
	/** Layer that supplied the winning value of each key */
	readonly sources: Readonly<Record<string, string>>;
	readonly settings: Readonly<ReconcilerSettings>;
	readonly topology: Topology;
	readonly externalDependencies: readonly HealthCheckDescriptor[];
	readonly issues: readonly ConfigIssue[];
}

const INTERPOLATION = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class ConfigResolver {
	private readonly log: ComponentLogger;

	constructor(logger?: Logger) {
		this.log = new ComponentLogger(logger, 'ConfigResolver');
	}

	public resolve(layers: readonly ConfigLayer[]): ConfigSnapshot {
		if (!layers.some((layer) => layer.name === BASE_LAYER)) {
			throw new ConfigError('MissingBaseLayer', `Base configuration layer "${BASE_LAYER}" is missing`);
		}

		const values: ConfigValues = {};
		const sources: Record<string, string> = {};
		for (const layer of layers) {
			for (const [key, value] of Object.entries(layer.values)) {
				values[key] = _.cloneDeep(value);
				sources[key] = layer.name;
			}
		}

		const serviceInputs = isPresent(values[CONFIG_KEYS.topology])
			? parseStructured(CONFIG_KEYS.topology, values[CONFIG_KEYS.topology], TopologyInputSchema)
			: undefined;
		const dependencyInputs = isPresent(values[CONFIG_KEYS.externalDependencies])
			? parseStructured(
					CONFIG_KEYS.externalDependencies,
					values[CONFIG_KEYS.externalDependencies],
					ExternalDependencyInputSchema.array(),
				)
			: [];

		const missing = requiredKeys(serviceInputs, dependencyInputs)
			.filter((key) => !isPresent(values[key]))
			.sort();
		if (serviceInputs === undefined || missing.length > 0) {
			throw ConfigError.missingRequiredKeys(missing);
		}

		const settings = this.parseSettings(values);
		const services = serviceInputs.map((input) => buildServiceSpec(input, values));
		const topology = Topology.fromSpecs(services);

		// Health results are keyed by target name
		const collisions = _.uniq(dependencyInputs.map((input) => input.name).filter((name) => topology.get(name))).sort();
		if (collisions.length > 0) {
			throw new ConfigError(
				'InvalidTopology',
				`External dependency name(s) collide with services: ${collisions.join(', ')}`,
				[CONFIG_KEYS.externalDependencies],
			);
		}
		const externalDependencies = dependencyInputs.map((input) => buildRemoteCheck(input.name, input, values));

		const issues: ConfigIssue[] = Object.keys(sources)
			.filter((key) => sources[key] === TEMPLATE_LAYER)
			.sort()
			.map((key) => ({
				code: 'TemplateValueInUse',
				key,
				message: `${key} still carries the value from the example template`,
			}));

		this.log.debugSync('Configuration resolved', {
			layers: layers.map((layer) => layer.name),
			keys: Object.keys(values).length,
			services: topology.size,
			externalDependencies: externalDependencies.length,
			issues: issues.length,
		});

		return deepFreeze({
			layers: layers.map((layer) => layer.name),
			values,
			sources,
			settings,
			topology,
			externalDependencies,
			issues,
		});
	}

	private parseSettings(values: ConfigValues): ReconcilerSettings {
		const raw = _.pick(values, SETTINGS_KEYS);
		const parsed = SettingsSchema.safeParse(raw);
		if (!parsed.success) {
			throw invalidValue('settings', parsed.error);
		}
		return parsed.data;
	}
}

// ============================================================================
// Helpers
// ============================================================================

function isPresent(value: ConfigValue | undefined): value is ConfigValue {
	return value !== undefined && value !== null && value !== '';
}

/**
 * Structured keys may arrive as JSON text when they come from env files
 */
function parseStructured<T extends z.ZodTypeAny>(key: string, value: ConfigValue, schema: T): z.output<T> {
	let structured: unknown = value;
	if (typeof value === 'string') {
		try {
			structured = JSON.parse(value);
		} catch {
			throw new ConfigError('InvalidValue', `${key} is not valid JSON`, [key]);
		}
	}

	const parsed = schema.safeParse(structured);
	if (!parsed.success) {
		throw invalidValue(key, parsed.error);
	}
	return parsed.data;
}

function invalidValue(key: string, error: z.ZodError): ConfigError {
	const details = error.issues
		.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : key}: ${issue.message}`)
		.join('; ');
	return new ConfigError('InvalidValue', `Invalid ${key}: ${details}`, [key]);
}

function requiredKeys(services: ServiceSpecInput[] | undefined, dependencies: ExternalDependencyInput[]): string[] {
	const keys: string[] = [CONFIG_KEYS.topology];

	for (const service of services ?? []) {
		keys.push(...service.requiredConfig);
		if (service.healthCheck?.kind === 'remote' && !service.healthCheck.url && service.healthCheck.urlKey) {
			keys.push(service.healthCheck.urlKey);
		}
		for (const value of Object.values(service.environment)) {
			for (const match of value.matchAll(INTERPOLATION)) {
				keys.push(match[1]);
			}
		}
	}

	for (const dependency of dependencies) {
		if (!dependency.url && dependency.urlKey) {
			keys.push(dependency.urlKey);
		}
	}

	return _.uniq(keys);
}

function stringValue(value: ConfigValue | undefined): string {
	if (value === undefined || value === null) {
		return '';
	}
	return typeof value === 'string' ? value : typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function buildServiceSpec(input: ServiceSpecInput, values: ConfigValues): ServiceSpec {
	const environment = _.mapValues(input.environment, (value) =>
		value.replace(INTERPOLATION, (_match, key: string) => stringValue(values[key])),
	);

	let healthCheck: HealthCheckDescriptor | undefined;
	if (input.healthCheck?.kind === 'local') {
		healthCheck = {
			kind: 'local',
			target: input.name,
			port: input.healthCheck.port,
			...(input.healthCheck.host ? { host: input.healthCheck.host } : {}),
			...(input.healthCheck.path ? { path: input.healthCheck.path } : {}),
			...(input.healthCheck.expectedStatus ? { expectedStatus: input.healthCheck.expectedStatus } : {}),
		};
	} else if (input.healthCheck?.kind === 'remote') {
		healthCheck = buildRemoteCheck(input.name, input.healthCheck, values);
	}

	return {
		name: input.name,
		image: input.image,
		ports: input.ports,
		dependsOn: input.dependsOn,
		environment,
		volumes: input.volumes,
		requiredConfig: input.requiredConfig,
		...(healthCheck ? { healthCheck } : {}),
	};
}

function buildRemoteCheck(
	target: string,
	input: Pick<Extract<HealthCheckInput, { kind: 'remote' }>, 'url' | 'urlKey' | 'path' | 'expectedStatus'>,
	values: ConfigValues,
): HealthCheckDescriptor {
	const base = input.url ?? (input.urlKey ? stringValue(values[input.urlKey]) : '');
	if (!base) {
		throw new ConfigError('InvalidValue', `Remote check for ${target} needs "url" or "urlKey"`, [target]);
	}

	const url = joinUrl(base, input.path);
	try {
		new URL(url);
	} catch {
		throw new ConfigError('InvalidValue', `Remote check for ${target} has an invalid URL: ${url}`, [input.urlKey ?? target]);
	}

	return {
		kind: 'remote',
		target,
		url,
		...(input.expectedStatus ? { expectedStatus: input.expectedStatus } : {}),
	};
}

function joinUrl(base: string, path: string): string {
	if (!path) {
		return base;
	}
	return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

function deepFreeze<T>(value: T, seen = new WeakSet<object>()): T {
	if (value !== null && typeof value === 'object' && !seen.has(value)) {
		seen.add(value);
		Object.freeze(value);
		for (const nested of Object.values(value)) {
			deepFreeze(nested, seen);
		}
	}
	return value;
}
