/**
 * RECONCILIATION PLANNER
 * ======================
 *
 * Diffs the desired topology against the inventory and produces an ordered,
 * re-runnable action plan:
 *
 *   rank 0        stop/remove orphans (containers, then networks, then volumes)
 *   rank 1        create absent networks and volumes
 *   rank 2+depth  create/start services in dependency order
 *
 * Equal ranks are ordered by service name, create before start. Planning
 * against a converged inventory yields an empty plan.
 */

import _ from 'lodash';
import { InternalInconsistencyError, PlanError } from '../lib/errors';
import type { Logger } from '../logging/logger';
import { ComponentLogger } from '../logging/component-logger';
import { containerName, networkName, volumeName, type Topology } from '../config/topology';
import type { ServiceSpec } from '../config/types';
import { targetIdentity, type Action, type ActionKind, type InventoryRecord, type RuntimeObjectKind } from './types';

export interface PlannerOptions {
	projectName: string;
	/** Remove volumes that no service mounts anymore (destroys their data) */
	pruneOrphanVolumes?: boolean;
}

const ORPHAN_RANK = 0;
const INFRA_RANK = 1;
const SERVICE_BASE_RANK = 2;

const KIND_ORDER: Record<RuntimeObjectKind, number> = { container: 0, network: 1, volume: 2 };
const ACTION_ORDER: Record<ActionKind, number> = { stop: 0, remove: 1, create: 2, start: 3 };

export class ReconciliationPlanner {
	private readonly log: ComponentLogger;

	constructor(
		private readonly options: PlannerOptions,
		logger?: Logger,
	) {
		this.log = new ComponentLogger(logger, 'ReconciliationPlanner');
	}

	/**
	 * @throws PlanError when the topology has a dependency cycle
	 */
	public plan(desired: Topology, current: readonly InventoryRecord[]): Action[] {
		const { projectName } = this.options;
		const order = topologicalOrder(desired);
		const actions: Action[] = [];

		// 1. Orphans first: stale objects cause name and port collisions
		for (const record of current) {
			if (record.state !== 'orphaned') {
				continue;
			}
			if (record.kind === 'volume' && !this.options.pruneOrphanVolumes) {
				this.log.warnSync('Leaving orphaned volume in place', { volume: record.name });
				continue;
			}

			const target = { kind: record.kind, name: record.name, id: record.id, service: record.service };
			if (record.kind === 'container' && record.runtimeState === 'running') {
				actions.push({ kind: 'stop', target, rank: ORPHAN_RANK, requires: [] });
			}
			actions.push({ kind: 'remove', target, rank: ORPHAN_RANK, requires: [] });
		}

		// 2. Shared infrastructure
		for (const record of current) {
			if (record.state === 'absent' && (record.kind === 'network' || record.kind === 'volume')) {
				actions.push({
					kind: 'create',
					target: { kind: record.kind, name: record.name },
					rank: INFRA_RANK,
					requires: [],
				});
			}
		}

		// 3. Services in dependency order
		const depth = new Map<string, number>();
		for (const service of order) {
			const serviceDepth = Math.max(-1, ...service.dependsOn.map((dep) => depth.get(dep) ?? 0)) + 1;
			depth.set(service.name, serviceDepth);

			const name = containerName(projectName, service.name);
			const record = current.find(
				(entry) => entry.kind === 'container' && entry.service === service.name && entry.state !== 'orphaned',
			);
			const state = record?.state ?? 'absent';
			if (state === 'running') {
				continue;
			}

			const target = { kind: 'container' as const, name, service: service.name };
			const rank = SERVICE_BASE_RANK + serviceDepth;
			const requires = this.requirementsOf(service, current);

			if (state === 'absent') {
				actions.push({ kind: 'create', target, rank, requires });
			}
			actions.push({ kind: 'start', target, rank, requires });
		}

		const plan = _.sortBy(actions, [
			(action) => action.rank,
			(action) => KIND_ORDER[action.target.kind],
			(action) => action.target.service ?? action.target.name,
			(action) => action.target.name,
			(action) => ACTION_ORDER[action.kind],
		]);

		assertConsistent(plan);

		this.log.infoSync('Plan computed', {
			actions: plan.length,
			orphansRemoved: plan.filter((action) => action.kind === 'remove').length,
			servicesStarted: plan.filter((action) => action.kind === 'start').length,
		});

		return plan;
	}

	/**
	 * Identities whose failure makes creating or starting a service pointless
	 */
	private requirementsOf(service: ServiceSpec, current: readonly InventoryRecord[]): string[] {
		const { projectName } = this.options;
		const name = containerName(projectName, service.name);

		const collidingOrphans = current
			.filter((record) => record.kind === 'container' && record.state === 'orphaned' && record.name === name)
			.map((record) => targetIdentity({ kind: 'container', name: record.name, id: record.id }));

		return [
			targetIdentity({ kind: 'network', name: networkName(projectName) }),
			..._.uniq(service.volumes.map((mount) => mount.slice(0, mount.indexOf(':')))).map((volume) =>
				targetIdentity({ kind: 'volume', name: volumeName(projectName, volume) }),
			),
			...service.dependsOn.map((dep) => targetIdentity({ kind: 'container', name: containerName(projectName, dep) })),
			...collidingOrphans,
		];
	}
}

/**
 * Kahn's algorithm; ready services are taken in name order
 *
 * @throws PlanError naming the services on a cycle
 */
export function topologicalOrder(topology: Topology): ServiceSpec[] {
	const remaining = new Map(topology.services.map((service) => [service.name, new Set(service.dependsOn)]));
	const order: ServiceSpec[] = [];

	while (remaining.size > 0) {
		const ready = [...remaining.entries()]
			.filter(([, deps]) => deps.size === 0)
			.map(([name]) => name)
			.sort();

		if (ready.length === 0) {
			throw new PlanError(findCycle(remaining));
		}

		for (const name of ready) {
			remaining.delete(name);
			for (const deps of remaining.values()) {
				deps.delete(name);
			}
			const service = topology.get(name);
			if (service) {
				order.push(service);
			}
		}
	}

	return order;
}

function findCycle(remaining: Map<string, Set<string>>): string[] {
	const start = [...remaining.keys()].sort()[0];
	const path: string[] = [];
	let current: string | undefined = start;

	while (current !== undefined && !path.includes(current)) {
		path.push(current);
		current = [...(remaining.get(current) ?? [])].sort()[0];
	}

	if (current === undefined) {
		return path;
	}
	return [...path.slice(path.indexOf(current)), current];
}

function assertConsistent(plan: Action[]): void {
	const seen = new Map<string, Set<ActionKind>>();
	for (const action of plan) {
		const identity = targetIdentity(action.target);
		const kinds = seen.get(identity) ?? new Set<ActionKind>();
		if (kinds.has(action.kind) || (action.kind === 'create' && kinds.has('remove')) || (action.kind === 'remove' && kinds.has('create'))) {
			throw new InternalInconsistencyError(`Conflicting ${action.kind} actions for ${identity}`);
		}
		kinds.add(action.kind);
		seen.set(identity, kinds);
	}
}
