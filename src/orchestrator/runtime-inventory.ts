/**
 * RUNTIME INVENTORY
 * =================
 *
 * Queries the runtime and classifies every project object against the
 * desired topology:
 * - a container matches a service when its name is the service's container
 *   name AND its spec-hash label equals the desired spec hash
 * - networks and volumes match by name
 * - anything else that belongs to the project is orphaned, including a
 *   stale container that holds a desired name with a conflicting identity
 * - desired objects missing from the runtime are reported absent
 */

import { RuntimeUnavailableError, errorMessage } from '../lib/errors';
import type { Logger } from '../logging/logger';
import { ComponentLogger } from '../logging/component-logger';
import { LABELS, containerName, networkName, specHash, volumeName, type Topology } from '../config/topology';
import type { RuntimeDriver } from './runtime-driver';
import type { InventoryRecord, RuntimeObject, RuntimeObjectKind } from './types';

const KIND_ORDER: Record<RuntimeObjectKind, number> = { container: 0, network: 1, volume: 2 };

export class RuntimeInventory {
	private readonly log: ComponentLogger;

	constructor(
		private readonly driver: RuntimeDriver,
		private readonly projectName: string,
		logger?: Logger,
	) {
		this.log = new ComponentLogger(logger, 'RuntimeInventory');
	}

	/**
	 * @throws RuntimeUnavailableError when the runtime cannot be reached
	 */
	public async refresh(desired: Topology): Promise<InventoryRecord[]> {
		let objects: RuntimeObject[];
		try {
			await this.driver.ping();
			objects = await this.driver.listObjects(this.projectName);
		} catch (error) {
			throw new RuntimeUnavailableError(
				`Container runtime "${this.driver.name}" is unavailable: ${errorMessage(error)}`,
				error,
			);
		}

		const records = [
			...this.classifyContainers(desired, objects.filter((object) => object.kind === 'container')),
			...this.classifyByName('network', [networkName(this.projectName)], objects),
			...this.classifyByName(
				'volume',
				desired.volumeNames().map((volume) => volumeName(this.projectName, volume)),
				objects,
			),
		].sort((a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || a.name.localeCompare(b.name));

		for (const record of records.filter((entry) => entry.state === 'orphaned')) {
			this.log.warnSync('Orphaned runtime object', {
				kind: record.kind,
				name: record.name,
				reason: record.lastError,
			});
		}

		this.log.infoSync('Inventory refreshed', {
			projectName: this.projectName,
			objects: objects.length,
			absent: records.filter((record) => record.state === 'absent').length,
			orphaned: records.filter((record) => record.state === 'orphaned').length,
		});

		return records;
	}

	private classifyContainers(desired: Topology, containers: RuntimeObject[]): InventoryRecord[] {
		const records: InventoryRecord[] = [];
		const expected = new Map(
			desired.services.map((service) => [
				containerName(this.projectName, service.name),
				{ service: service.name, hash: specHash(service) },
			]),
		);
		const matched = new Set<string>();

		for (const container of containers) {
			const wanted = expected.get(container.name);
			const observedHash = container.labels[LABELS.specHash];

			if (wanted && observedHash === wanted.hash) {
				matched.add(wanted.service);
				records.push({
					kind: 'container',
					name: container.name,
					id: container.id,
					state: container.state ?? 'stopped',
					service: wanted.service,
					image: container.image,
					specHash: observedHash,
				});
				continue;
			}

			records.push({
				kind: 'container',
				name: container.name,
				id: container.id,
				state: 'orphaned',
				service: wanted?.service ?? container.labels[LABELS.service],
				image: container.image,
				specHash: observedHash,
				runtimeState: container.state,
				lastError: wanted
					? observedHash
						? `conflicting identity: spec hash ${observedHash} differs from desired ${wanted.hash}`
						: 'conflicting identity: container was not created by this project'
					: 'not part of the desired topology',
			});
		}

		for (const [name, wanted] of expected) {
			if (!matched.has(wanted.service)) {
				records.push({
					kind: 'container',
					name,
					state: 'absent',
					service: wanted.service,
					specHash: wanted.hash,
				});
			}
		}

		return records;
	}

	private classifyByName(kind: 'network' | 'volume', desiredNames: string[], objects: RuntimeObject[]): InventoryRecord[] {
		const records: InventoryRecord[] = [];
		const present = objects.filter((object) => object.kind === kind);
		const presentNames = new Set(present.map((object) => object.name));

		for (const object of present) {
			const isDesired = desiredNames.includes(object.name);
			records.push({
				kind,
				name: object.name,
				id: object.id,
				state: isDesired ? 'created' : 'orphaned',
				...(isDesired ? {} : { lastError: 'not part of the desired topology' }),
			});
		}

		for (const name of desiredNames) {
			if (!presentNames.has(name)) {
				records.push({ kind, name, state: 'absent' });
			}
		}

		return records;
	}
}
