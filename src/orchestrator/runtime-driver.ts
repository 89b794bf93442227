/**
 * RUNTIME DRIVER INTERFACE
 * ========================
 *
 * Container runtime collaborator used by the inventory and the executor.
 * Every mutating operation must be safe to retry: removing a missing object,
 * starting a running container or stopping a stopped one succeed.
 */

import type { Logger, LogContext } from '../logging/logger';
import type { ContainerCreateSpec, RuntimeObject, RuntimeObjectKind } from './types';

export interface RuntimeDriver {
	/** Driver name (e.g., 'docker') */
	readonly name: string;

	/**
	 * Verify the runtime answers at all
	 *
	 * @throws when the runtime cannot be reached
	 */
	ping(): Promise<void>;

	/**
	 * List containers, networks and volumes belonging to a project, by project
	 * label or by name prefix (leftovers of older runs may carry no label)
	 */
	listObjects(projectName: string): Promise<RuntimeObject[]>;

	/**
	 * Create (but do not start) a container, pulling its image when missing
	 *
	 * @returns Container ID
	 */
	createContainer(spec: ContainerCreateSpec): Promise<string>;

	startContainer(nameOrId: string): Promise<void>;

	/**
	 * @param timeoutSeconds - Graceful shutdown timeout
	 */
	stopContainer(nameOrId: string, timeoutSeconds?: number): Promise<void>;

	/**
	 * Remove an object; running containers are removed forcibly
	 */
	removeObject(kind: RuntimeObjectKind, nameOrId: string): Promise<void>;

	createNetwork(name: string, labels: Record<string, string>): Promise<void>;

	createVolume(name: string, labels: Record<string, string>): Promise<void>;

	/**
	 * Address of a container on the given network, used by local port probes
	 */
	resolveAddress(containerName: string, network?: string): Promise<string | undefined>;
}

/**
 * Base class with the logging plumbing drivers share
 */
export abstract class BaseRuntimeDriver implements RuntimeDriver {
	abstract readonly name: string;

	constructor(protected readonly logger?: Logger) {}

	abstract ping(): Promise<void>;
	abstract listObjects(projectName: string): Promise<RuntimeObject[]>;
	abstract createContainer(spec: ContainerCreateSpec): Promise<string>;
	abstract startContainer(nameOrId: string): Promise<void>;
	abstract stopContainer(nameOrId: string, timeoutSeconds?: number): Promise<void>;
	abstract removeObject(kind: RuntimeObjectKind, nameOrId: string): Promise<void>;
	abstract createNetwork(name: string, labels: Record<string, string>): Promise<void>;
	abstract createVolume(name: string, labels: Record<string, string>): Promise<void>;
	abstract resolveAddress(containerName: string, network?: string): Promise<string | undefined>;

	protected log(level: 'debug' | 'info' | 'warn', message: string, meta?: LogContext): void {
		const logMeta = {
			component: 'RuntimeDriver',
			driver: this.name,
			...meta,
		};

		switch (level) {
			case 'debug':
				this.logger?.debugSync(message, logMeta);
				break;
			case 'info':
				this.logger?.infoSync(message, logMeta);
				break;
			case 'warn':
				this.logger?.warnSync(message, logMeta);
				break;
		}
	}
}
