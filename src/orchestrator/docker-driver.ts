/**
 * DOCKER RUNTIME DRIVER
 * =====================
 *
 * dockerode implementation of the runtime driver.
 * Handles: pulling images, creating/starting/stopping/removing containers,
 * and the project network and volumes.
 */

import Docker from 'dockerode';
import { isNotFoundError, isNotModifiedError, toError } from '../lib/errors';
import type { Logger } from '../logging/logger';
import { LABELS } from '../config/topology';
import { BaseRuntimeDriver } from './runtime-driver';
import type { ContainerCreateSpec, ContainerRuntimeState, RuntimeObject, RuntimeObjectKind } from './types';

export class DockerDriver extends BaseRuntimeDriver {
	readonly name = 'docker';

	private docker: Docker;

	constructor(dockerOptions?: Docker.DockerOptions, logger?: Logger) {
		super(logger);

		if (dockerOptions) {
			this.docker = new Docker(dockerOptions);
		} else if (process.platform === 'win32') {
			// Docker Desktop named pipe
			this.docker = new Docker({ socketPath: '//./pipe/docker_engine' });
		} else {
			this.docker = new Docker({ socketPath: process.env.DOCKER_SOCKET ?? '/var/run/docker.sock' });
		}
	}

	async ping(): Promise<void> {
		await this.docker.ping();
	}

	// ========================================================================
	// INVENTORY
	// ========================================================================

	async listObjects(projectName: string): Promise<RuntimeObject[]> {
		const labelFilter = [`${LABELS.project}=${projectName}`];

		const [labeledContainers, namedContainers] = await Promise.all([
			this.docker.listContainers({ all: true, filters: { label: labelFilter } }),
			this.docker.listContainers({ all: true, filters: { name: [`${projectName}-`] } }),
		]);

		const containers = new Map<string, RuntimeObject>();
		for (const info of [...labeledContainers, ...namedContainers]) {
			const name = info.Names[0]?.replace(/^\//, '') ?? info.Id;
			const labels = info.Labels ?? {};
			if (!belongsToProject(labels, name, projectName, '-')) {
				continue;
			}
			containers.set(info.Id, {
				kind: 'container',
				id: info.Id,
				name,
				labels,
				state: mapContainerState(info.State),
				image: info.Image,
			});
		}

		const networks = (await this.docker.listNetworks())
			.filter((network) => belongsToProject(network.Labels, network.Name, projectName, '_'))
			.map<RuntimeObject>((network) => ({
				kind: 'network',
				id: network.Id,
				name: network.Name,
				labels: network.Labels ?? {},
			}));

		const { Volumes } = await this.docker.listVolumes();
		const volumes = (Volumes ?? [])
			.filter((volume) => belongsToProject(volume.Labels, volume.Name, projectName, '_'))
			.map<RuntimeObject>((volume) => ({
				kind: 'volume',
				id: volume.Name,
				name: volume.Name,
				labels: volume.Labels ?? {},
			}));

		this.log('debug', 'Listed runtime objects', {
			projectName,
			containers: containers.size,
			networks: networks.length,
			volumes: volumes.length,
		});

		return [...containers.values(), ...networks, ...volumes];
	}

	async resolveAddress(containerName: string, network?: string): Promise<string | undefined> {
		const inspectData = await this.docker.getContainer(containerName).inspect();
		const networks = inspectData.NetworkSettings.Networks;
		const networkName = network && networks[network] ? network : Object.keys(networks)[0];
		if (!networkName) {
			return undefined;
		}
		return networks[networkName].IPAddress || undefined;
	}

	// ========================================================================
	// IMAGE OPERATIONS
	// ========================================================================

	async hasImage(imageName: string): Promise<boolean> {
		try {
			await this.docker.getImage(imageName).inspect();
			return true;
		} catch (error) {
			if (isNotFoundError(error)) {
				return false;
			}
			throw error;
		}
	}

	async pullImage(imageName: string): Promise<void> {
		this.log('info', 'Pulling image', { imageName });

		const stream: NodeJS.ReadableStream = await this.docker.pull(imageName);
		await new Promise<void>((resolve, reject) => {
			this.docker.modem.followProgress(stream, (err: Error | null) => {
				if (err) {
					reject(err);
					return;
				}
				resolve();
			});
		});

		this.log('info', 'Pulled image', { imageName });
	}

	// ========================================================================
	// CONTAINER OPERATIONS
	// ========================================================================

	async createContainer(spec: ContainerCreateSpec): Promise<string> {
		if (!(await this.hasImage(spec.image))) {
			await this.pullImage(spec.image);
		}

		const portBindings: Docker.PortMap = {};
		const exposedPorts: Record<string, object> = {};
		for (const mapping of spec.ports) {
			const [hostPort, containerPort] = mapping.split(':');
			const port = `${containerPort}/tcp`;
			exposedPorts[port] = {};
			portBindings[port] = [{ HostPort: hostPort }];
		}

		const createOptions: Docker.ContainerCreateOptions = {
			name: spec.name,
			Image: spec.image,
			Env: Object.entries(spec.environment).map(([key, value]) => `${key}=${value}`),
			Labels: spec.labels,
			ExposedPorts: exposedPorts,
			HostConfig: {
				PortBindings: portBindings,
				Binds: spec.volumes.length > 0 ? spec.volumes : undefined,
				NetworkMode: spec.network,
				RestartPolicy: { Name: 'unless-stopped', MaximumRetryCount: 0 },
			},
			NetworkingConfig: {
				EndpointsConfig: {
					[spec.network]: { Aliases: spec.aliases },
				},
			},
		};

		const container = await this.docker.createContainer(createOptions);
		this.log('info', 'Container created', { name: spec.name, containerId: container.id.substring(0, 12) });
		return container.id;
	}

	async startContainer(nameOrId: string): Promise<void> {
		try {
			await this.docker.getContainer(nameOrId).start();
			this.log('info', 'Container started', { container: nameOrId });
		} catch (error) {
			if (!isNotModifiedError(error)) {
				throw toError(error);
			}
			this.log('debug', 'Container already running', { container: nameOrId });
		}
	}

	async stopContainer(nameOrId: string, timeoutSeconds: number = 10): Promise<void> {
		try {
			await this.docker.getContainer(nameOrId).stop({ t: timeoutSeconds });
			this.log('info', 'Container stopped', { container: nameOrId });
		} catch (error) {
			if (!isNotModifiedError(error) && !isNotFoundError(error)) {
				throw toError(error);
			}
			this.log('debug', 'Container already stopped', { container: nameOrId });
		}
	}

	async removeObject(kind: RuntimeObjectKind, nameOrId: string): Promise<void> {
		try {
			switch (kind) {
				case 'container':
					await this.docker.getContainer(nameOrId).remove({ force: true });
					break;
				case 'network':
					await this.docker.getNetwork(nameOrId).remove();
					break;
				case 'volume':
					await this.docker.getVolume(nameOrId).remove();
					break;
			}
			this.log('info', 'Removed runtime object', { kind, target: nameOrId });
		} catch (error) {
			if (!isNotFoundError(error)) {
				throw toError(error);
			}
			this.log('debug', 'Runtime object already removed', { kind, target: nameOrId });
		}
	}

	// ========================================================================
	// NETWORK / VOLUME OPERATIONS
	// ========================================================================

	async createNetwork(name: string, labels: Record<string, string>): Promise<void> {
		await this.docker.createNetwork({ Name: name, Driver: 'bridge', Labels: labels, CheckDuplicate: true });
		this.log('info', 'Network created', { name });
	}

	async createVolume(name: string, labels: Record<string, string>): Promise<void> {
		await this.docker.createVolume({ Name: name, Labels: labels });
		this.log('info', 'Volume created', { name });
	}
}

function mapContainerState(state: string): ContainerRuntimeState {
	switch (state) {
		case 'created':
			return 'created';
		case 'running':
		case 'restarting':
			return 'running';
		default:
			return 'stopped';
	}
}

/**
 * An object carrying a project label belongs to that project only; unlabelled
 * objects are matched by name prefix. Keeps `stack` from claiming the objects
 * of `stack-dev` or `stack_x`.
 */
function belongsToProject(
	labels: Readonly<Record<string, string>> | null | undefined,
	name: string,
	projectName: string,
	separator: '-' | '_',
): boolean {
	const owner = labels?.[LABELS.project];
	if (owner !== undefined) {
		return owner === projectName;
	}
	return name.startsWith(`${projectName}${separator}`);
}
