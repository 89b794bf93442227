import { z } from 'zod';
import type { HealthCheckDescriptor } from '../health/types';
import type { LogLevel } from '../logging/types';

/**
 * JSON value carried by a configuration layer
 */
export type ConfigValue = string | number | boolean | null | ConfigValue[] | { [key: string]: ConfigValue };

export type ConfigValues = Record<string, ConfigValue>;

/**
 * Named, ordered source of key/value overrides
 */
export interface ConfigLayer {
	name: string;
	values: ConfigValues;
}

export const BASE_LAYER = 'defaults';

export const TEMPLATE_LAYER = 'example-template';

/**
 * Keys the engine itself needs
 */
export const CONFIG_KEYS = {
	topology: 'TOPOLOGY',
	externalDependencies: 'EXTERNAL_DEPENDENCIES',
	projectName: 'PROJECT_NAME',
	healthTimeoutMs: 'HEALTH_TIMEOUT_MS',
	pollIntervalMs: 'POLL_INTERVAL_MS',
	maxAttempts: 'MAX_ATTEMPTS',
	attemptTimeoutMs: 'ATTEMPT_TIMEOUT_MS',
	concurrency: 'HEALTH_CONCURRENCY',
	pruneOrphanVolumes: 'PRUNE_ORPHAN_VOLUMES',
	logLevel: 'LOG_LEVEL',
} as const;

export const SETTINGS_KEYS: string[] = [
	CONFIG_KEYS.projectName,
	CONFIG_KEYS.healthTimeoutMs,
	CONFIG_KEYS.pollIntervalMs,
	CONFIG_KEYS.maxAttempts,
	CONFIG_KEYS.attemptTimeoutMs,
	CONFIG_KEYS.concurrency,
	CONFIG_KEYS.pruneOrphanVolumes,
	CONFIG_KEYS.logLevel,
];

// ============================================================================
// SCHEMAS
// ============================================================================

const NameSchema = z.string().regex(/^[a-z0-9][a-z0-9_.-]*$/, 'lowercase letters, digits, "_", "." or "-"');

export const PortMappingSchema = z.string().regex(/^\d+:\d+$/, 'expected "hostPort:containerPort"');

export const VolumeMountSchema = z.string().regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*:\/.*$/, 'expected "volume:/container/path"');

const StatusListSchema = z.array(z.number().int().min(100).max(599)).nonempty();

export const HealthCheckInputSchema = z.discriminatedUnion('kind', [
	z.object({
		kind: z.literal('local'),
		port: z.number().int().positive(),
		host: z.string().min(1).optional(),
		path: z.string().startsWith('/').optional(),
		expectedStatus: StatusListSchema.optional(),
	}),
	z.object({
		kind: z.literal('remote'),
		url: z.string().url().optional(),
		urlKey: z.string().min(1).optional(),
		path: z.string().default(''),
		expectedStatus: StatusListSchema.optional(),
	}),
]);

export type HealthCheckInput = z.infer<typeof HealthCheckInputSchema>;

export const ServiceSpecInputSchema = z.object({
	name: NameSchema,
	image: z.string().min(1),
	ports: z.array(PortMappingSchema).default([]),
	dependsOn: z.array(NameSchema).default([]),
	environment: z.record(z.string()).default({}),
	volumes: z.array(VolumeMountSchema).default([]),
	healthCheck: HealthCheckInputSchema.optional(),
	requiredConfig: z.array(z.string().min(1)).default([]),
});

export type ServiceSpecInput = z.infer<typeof ServiceSpecInputSchema>;

export const TopologyInputSchema = z.array(ServiceSpecInputSchema);

export const ExternalDependencyInputSchema = z.object({
	name: NameSchema,
	url: z.string().url().optional(),
	urlKey: z.string().min(1).optional(),
	path: z.string().default(''),
	expectedStatus: StatusListSchema.optional(),
});

export type ExternalDependencyInput = z.infer<typeof ExternalDependencyInputSchema>;

const BooleanishSchema = z.union([
	z.boolean(),
	z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform((value) => value === 'true' || value === '1' || value === 'yes'),
]);

/**
 * Engine settings, keyed by their configuration key. Values coming from env
 * files are strings, hence the coercion.
 */
export const SettingsSchema = z
	.object({
		[CONFIG_KEYS.projectName]: NameSchema.default('stack'),
		[CONFIG_KEYS.healthTimeoutMs]: z.coerce.number().int().positive().default(60_000),
		[CONFIG_KEYS.pollIntervalMs]: z.coerce.number().int().positive().default(2_000),
		[CONFIG_KEYS.maxAttempts]: z.coerce.number().int().positive().default(30),
		[CONFIG_KEYS.attemptTimeoutMs]: z.coerce.number().int().positive().default(5_000),
		[CONFIG_KEYS.concurrency]: z.coerce.number().int().positive().default(4),
		[CONFIG_KEYS.pruneOrphanVolumes]: BooleanishSchema.default(false),
		[CONFIG_KEYS.logLevel]: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	})
	.transform((raw) => ({
		projectName: raw[CONFIG_KEYS.projectName],
		healthTimeoutMs: raw[CONFIG_KEYS.healthTimeoutMs],
		pollIntervalMs: raw[CONFIG_KEYS.pollIntervalMs],
		maxAttempts: raw[CONFIG_KEYS.maxAttempts],
		attemptTimeoutMs: raw[CONFIG_KEYS.attemptTimeoutMs],
		concurrency: raw[CONFIG_KEYS.concurrency],
		pruneOrphanVolumes: raw[CONFIG_KEYS.pruneOrphanVolumes],
		logLevel: raw[CONFIG_KEYS.logLevel],
	}));

export interface ReconcilerSettings {
	projectName: string;
	healthTimeoutMs: number;
	pollIntervalMs: number;
	maxAttempts: number;
	attemptTimeoutMs: number;
	concurrency: number;
	pruneOrphanVolumes: boolean;
	logLevel: LogLevel;
}

// ============================================================================
// RESOLVED MODEL
// ============================================================================

/**
 * Fully resolved service definition. Immutable once loaded.
 */
export interface ServiceSpec {
	readonly name: string;
	readonly image: string;
	readonly ports: readonly string[];
	readonly dependsOn: readonly string[];
	readonly environment: Readonly<Record<string, string>>;
	readonly volumes: readonly string[];
	readonly healthCheck?: HealthCheckDescriptor;
	readonly requiredConfig: readonly string[];
}

export interface ConfigIssue {
	code: 'TemplateValueInUse';
	key: string;
	message: string;
}
