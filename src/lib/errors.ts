/**
 * Reconciler errors
 *
 * Fatal errors (config, runtime, plan) abort a run before any runtime
 * mutation. Action and health errors are recorded per item and surface only
 * in the diagnostic report.
 */

export abstract class ReconcilerError extends Error {
	abstract readonly code: string;
	abstract readonly fatal: boolean;

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

export type ConfigErrorCode =
	| 'MissingRequiredKey'
	| 'MissingBaseLayer'
	| 'InvalidValue'
	| 'InvalidTopology';

export class ConfigError extends ReconcilerError {
	readonly fatal = true;

	constructor(
		readonly code: ConfigErrorCode,
		message: string,
		readonly keys: string[] = [],
	) {
		super(message);
	}

	static missingRequiredKeys(keys: string[]): ConfigError {
		return new ConfigError(
			'MissingRequiredKey',
			`Missing required configuration key(s): ${keys.join(', ')}`,
			keys,
		);
	}
}

export class RuntimeUnavailableError extends ReconcilerError {
	readonly code = 'RuntimeUnavailable';
	readonly fatal = true;

	constructor(message: string, cause?: unknown) {
		super(message, { cause });
	}
}

export class PlanError extends ReconcilerError {
	readonly code = 'CyclicDependency';
	readonly fatal = true;

	constructor(readonly cycle: string[]) {
		super(`Cyclic dependency between services: ${cycle.join(' -> ')}`);
	}
}

/**
 * A single runtime operation failed. Never thrown past the executor.
 */
export class ActionError extends ReconcilerError {
	readonly code = 'ActionFailed';
	readonly fatal = false;

	constructor(
		readonly actionKind: string,
		readonly target: string,
		cause: unknown,
	) {
		super(`${actionKind} ${target} failed: ${errorMessage(cause)}`, { cause });
	}
}

export class InternalInconsistencyError extends ReconcilerError {
	readonly code = 'InternalInconsistency';
	readonly fatal = true;
}

export function isNotFoundError(error: unknown): boolean {
	if (typeof error !== 'object' || error === null) {
		return false;
	}
	if ('statusCode' in error && error.statusCode === 404) {
		return true;
	}
	if ('code' in error && error.code === 'ENOENT') {
		return true;
	}
	return 'message' in error && typeof error.message === 'string' && error.message.toLowerCase().includes('no such');
}

/**
 * Docker answers 304 when a container is already in the requested state
 */
export function isNotModifiedError(error: unknown): boolean {
	return typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === 304;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
