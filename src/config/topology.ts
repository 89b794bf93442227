/**
 * TOPOLOGY
 * ========
 *
 * Ordered, read-only set of ServiceSpecs forming the desired dependency graph.
 * Construction rejects duplicate names and dangling dependency references;
 * cycles are detected by the planner's topological sort.
 */

import crypto from 'crypto';
import { ConfigError } from '../lib/errors';
import type { ServiceSpec } from './types';

export class Topology {
	private readonly byName: ReadonlyMap<string, ServiceSpec>;

	private constructor(readonly services: readonly ServiceSpec[]) {
		this.byName = new Map(services.map((service) => [service.name, service]));
	}

	static fromSpecs(specs: readonly ServiceSpec[]): Topology {
		const seen = new Set<string>();
		const duplicates = new Set<string>();
		for (const spec of specs) {
			if (seen.has(spec.name)) {
				duplicates.add(spec.name);
			}
			seen.add(spec.name);
		}
		if (duplicates.size > 0) {
			throw new ConfigError('InvalidTopology', `Duplicate service name(s): ${[...duplicates].join(', ')}`);
		}

		const dangling: string[] = [];
		for (const spec of specs) {
			for (const dep of spec.dependsOn) {
				if (!seen.has(dep)) {
					dangling.push(`${spec.name} -> ${dep}`);
				}
			}
		}
		if (dangling.length > 0) {
			throw new ConfigError('InvalidTopology', `Unknown dependency reference(s): ${dangling.join(', ')}`);
		}

		const topology = new Topology(Object.freeze([...specs]));
		Object.freeze(topology);
		return topology;
	}

	get size(): number {
		return this.services.length;
	}

	has(name: string): boolean {
		return this.byName.has(name);
	}

	get(name: string): ServiceSpec | undefined {
		return this.byName.get(name);
	}

	names(): string[] {
		return this.services.map((service) => service.name);
	}

	dependenciesOf(name: string): readonly string[] {
		return this.byName.get(name)?.dependsOn ?? [];
	}

	/**
	 * Services depending on `name`, directly or transitively
	 */
	dependentsOf(name: string): string[] {
		const result = new Set<string>();
		const queue = [name];
		while (queue.length > 0) {
			const current = queue.shift();
			for (const service of this.services) {
				if (current !== undefined && service.dependsOn.includes(current) && !result.has(service.name)) {
					result.add(service.name);
					queue.push(service.name);
				}
			}
		}
		return [...result].sort();
	}

	/**
	 * Named volumes referenced by any service
	 */
	volumeNames(): string[] {
		const names = new Set<string>();
		for (const service of this.services) {
			for (const mount of service.volumes) {
				names.add(mount.slice(0, mount.indexOf(':')));
			}
		}
		return [...names].sort();
	}
}

// ============================================================================
// RUNTIME NAMING
// ============================================================================

export const LABELS = {
	project: 'io.stack-reconciler.project',
	service: 'io.stack-reconciler.service',
	specHash: 'io.stack-reconciler.spec-hash',
} as const;

export function containerName(projectName: string, serviceName: string): string {
	return `${projectName}-${serviceName}`;
}

export function networkName(projectName: string): string {
	return `${projectName}_default`;
}

export function volumeName(projectName: string, volume: string): string {
	return `${projectName}_${volume}`;
}

/**
 * Hash over everything that requires recreating the container when changed
 */
export function specHash(spec: ServiceSpec): string {
	const canonical = JSON.stringify({
		image: spec.image,
		ports: [...spec.ports].sort(),
		environment: Object.keys(spec.environment)
			.sort()
			.map((key) => [key, spec.environment[key]]),
		volumes: [...spec.volumes].sort(),
	});
	return crypto.createHash('sha256').update(canonical).digest('hex').substring(0, 16);
}
