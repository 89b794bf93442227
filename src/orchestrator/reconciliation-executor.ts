/**
 * RECONCILIATION EXECUTOR
 * =======================
 *
 * Applies a plan strictly in order. A failing action is recorded and
 * execution continues with the next one; an action whose requirements failed
 * (or were skipped) is skipped, so skips propagate to transitive dependents.
 *
 * Before a service is started, each dependency that declares a health check
 * goes through the readiness gate; an unhealthy dependency skips the start.
 * Nothing is rolled back: the next plan/execute cycle picks up from whatever
 * state this one leaves behind.
 */

import { EventEmitter } from 'events';
import { ActionError, InternalInconsistencyError } from '../lib/errors';
import type { Logger } from '../logging/logger';
import { ComponentLogger } from '../logging/component-logger';
import { LABELS, containerName, networkName, specHash, volumeName, type Topology } from '../config/topology';
import type { HealthCheckDescriptor, HealthCheckResult } from '../health/types';
import type { RuntimeDriver } from './runtime-driver';
import { describeTarget, targetIdentity, type Action, type ActionResult, type ContainerCreateSpec } from './types';

/**
 * Waits for a dependency to become healthy; never rejects
 */
export type ReadinessGate = (check: HealthCheckDescriptor) => Promise<HealthCheckResult>;

export interface ExecutorOptions {
	projectName: string;
	topology: Topology;
	readiness?: ReadinessGate;
}

interface ExecutorEvents {
	'action-completed': (result: ActionResult) => void;
}

export class ReconciliationExecutor extends EventEmitter {
	private readonly log: ComponentLogger;

	constructor(
		private readonly driver: RuntimeDriver,
		private readonly options: ExecutorOptions,
		logger?: Logger,
	) {
		super();
		this.log = new ComponentLogger(logger, 'ReconciliationExecutor');
	}

	public async execute(plan: readonly Action[], signal?: AbortSignal): Promise<ActionResult[]> {
		const results: ActionResult[] = [];
		// identity -> display name of the failed target
		const failed = new Map<string, string>();
		const readiness = new Map<string, HealthCheckResult>();

		for (const action of plan) {
			const startedAt = Date.now();
			const identity = targetIdentity(action.target);

			const skipReason = signal?.aborted ? 'cancelled' : await this.skipReason(action, failed, readiness);
			const result: ActionResult = skipReason
				? { action, status: 'skipped', reason: skipReason, durationMs: 0 }
				: await this.apply(action, startedAt);

			if (result.status === 'succeeded') {
				failed.delete(identity);
			} else {
				failed.set(identity, describeTarget(action.target));
			}

			this.logResult(result);
			this.emit('action-completed', result);
			results.push(result);
		}

		this.log.infoSync('Plan executed', {
			actions: results.length,
			succeeded: results.filter((result) => result.status === 'succeeded').length,
			failed: results.filter((result) => result.status === 'failed').length,
			skipped: results.filter((result) => result.status === 'skipped').length,
		});

		return results;
	}

	private async skipReason(
		action: Action,
		failed: ReadonlyMap<string, string>,
		readiness: Map<string, HealthCheckResult>,
	): Promise<string | undefined> {
		const identity = targetIdentity(action.target);
		// Removal is forced, so a failed graceful stop does not block it
		if (failed.has(identity) && action.kind !== 'remove') {
			return 'previous action on target failed';
		}

		const blocker = action.requires.find((requirement) => failed.has(requirement));
		if (blocker) {
			return `dependency failed: ${failed.get(blocker)}`;
		}

		if (action.kind === 'start' && action.target.service) {
			const unhealthy = await this.unhealthyDependency(action.target.service, readiness);
			if (unhealthy) {
				return `dependency unhealthy: ${unhealthy.target} (${unhealthy.status})`;
			}
		}

		return undefined;
	}

	/**
	 * First dependency with a health check that does not pass the readiness gate
	 */
	private async unhealthyDependency(
		serviceName: string,
		readiness: Map<string, HealthCheckResult>,
	): Promise<HealthCheckResult | undefined> {
		const gate = this.options.readiness;
		if (!gate) {
			return undefined;
		}

		for (const dependency of this.options.topology.dependenciesOf(serviceName)) {
			const check = this.options.topology.get(dependency)?.healthCheck;
			if (!check) {
				continue;
			}

			let result = readiness.get(dependency);
			if (!result) {
				this.log.debugSync('Waiting for dependency readiness', { service: serviceName, dependency });
				result = await gate(check);
				readiness.set(dependency, result);
			}

			if (result.status !== 'healthy') {
				return result;
			}
		}

		return undefined;
	}

	private async apply(action: Action, startedAt: number): Promise<ActionResult> {
		try {
			await this.dispatch(action);
			return { action, status: 'succeeded', durationMs: Date.now() - startedAt };
		} catch (error) {
			const actionError = new ActionError(action.kind, describeTarget(action.target), error);
			return { action, status: 'failed', error: actionError.message, durationMs: Date.now() - startedAt };
		}
	}

	private async dispatch(action: Action): Promise<void> {
		const { target } = action;
		const runtimeRef = target.id ?? target.name;
		const projectLabels = { [LABELS.project]: this.options.projectName };

		switch (action.kind) {
			case 'stop':
				await this.driver.stopContainer(runtimeRef);
				return;
			case 'remove':
				await this.driver.removeObject(target.kind, runtimeRef);
				return;
			case 'start':
				await this.driver.startContainer(runtimeRef);
				return;
			case 'create':
				switch (target.kind) {
					case 'network':
						await this.driver.createNetwork(target.name, projectLabels);
						return;
					case 'volume':
						await this.driver.createVolume(target.name, projectLabels);
						return;
					case 'container':
						await this.driver.createContainer(this.containerSpec(target.service));
						return;
				}
		}
	}

	private containerSpec(serviceName: string | undefined): ContainerCreateSpec {
		const { projectName, topology } = this.options;
		const service = serviceName ? topology.get(serviceName) : undefined;
		if (!service) {
			throw new InternalInconsistencyError(`No service definition for ${serviceName ?? 'unnamed container'}`);
		}

		return {
			name: containerName(projectName, service.name),
			image: service.image,
			labels: {
				[LABELS.project]: projectName,
				[LABELS.service]: service.name,
				[LABELS.specHash]: specHash(service),
			},
			environment: { ...service.environment },
			ports: [...service.ports],
			volumes: service.volumes.map((mount) => {
				const separator = mount.indexOf(':');
				return `${volumeName(projectName, mount.slice(0, separator))}${mount.slice(separator)}`;
			}),
			network: networkName(projectName),
			aliases: [service.name],
		};
	}

	private logResult(result: ActionResult): void {
		const context = {
			action: result.action.kind,
			kind: result.action.target.kind,
			target: describeTarget(result.action.target),
			rank: result.action.rank,
			durationMs: result.durationMs,
		};

		switch (result.status) {
			case 'succeeded':
				this.log.infoSync('Action applied', context);
				break;
			case 'skipped':
				this.log.warnSync('Action skipped', { ...context, reason: result.reason });
				break;
			case 'failed': {
				const { service } = result.action.target;
				// Services this failure holds back
				const affected = service ? this.options.topology.dependentsOf(service) : [];
				this.log.errorSync('Action failed', new Error(result.error ?? 'unknown error'), { ...context, affected });
				break;
			}
		}
	}

	// Typed event emitter methods
	public on<K extends keyof ExecutorEvents>(event: K, listener: ExecutorEvents[K]): this {
		return super.on(event, listener);
	}

	public emit<K extends keyof ExecutorEvents>(event: K, ...args: Parameters<ExecutorEvents[K]>): boolean {
		return super.emit(event, ...args);
	}
}
