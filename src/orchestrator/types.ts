/**
 * RECONCILIATION TYPES
 * ====================
 *
 * Shapes shared by the runtime driver, inventory, planner and executor.
 */

// ============================================================================
// RUNTIME OBJECTS
// ============================================================================

export type RuntimeObjectKind = 'container' | 'network' | 'volume';

export type ContainerRuntimeState = 'created' | 'running' | 'stopped';

/**
 * Object as reported by the runtime driver
 */
export interface RuntimeObject {
	kind: RuntimeObjectKind;
	id: string;
	name: string;
	labels: Record<string, string>;
	/** Containers only */
	state?: ContainerRuntimeState;
	image?: string;
}

export interface ContainerCreateSpec {
	name: string;
	image: string;
	labels: Record<string, string>;
	environment: Record<string, string>;
	/** "hostPort:containerPort" */
	ports: string[];
	/** "runtimeVolumeName:/container/path" */
	volumes: string[];
	network: string;
	aliases: string[];
}

// ============================================================================
// INVENTORY
// ============================================================================

export type LifecycleState = 'absent' | 'created' | 'running' | 'stopped' | 'orphaned';

/**
 * Observed state of one runtime object, classified against the topology.
 * Stale after any executor action until the inventory is refreshed.
 */
export interface InventoryRecord {
	kind: RuntimeObjectKind;
	name: string;
	id?: string;
	state: LifecycleState;
	/** Matched (or colliding) service name */
	service?: string;
	image?: string;
	specHash?: string;
	/** Runtime state of an orphaned container */
	runtimeState?: ContainerRuntimeState;
	/** Why the object is orphaned, or the last error seen for it */
	lastError?: string;
}

// ============================================================================
// PLAN
// ============================================================================

export type ActionKind = 'stop' | 'remove' | 'create' | 'start';

export interface ActionTarget {
	kind: RuntimeObjectKind;
	name: string;
	/** Set for objects that already exist in the runtime (orphans) */
	id?: string;
	service?: string;
}

export interface Action {
	kind: ActionKind;
	target: ActionTarget;
	rank: number;
	/** Identities that must not have failed for this action to run */
	requires: string[];
}

export type ActionStatus = 'succeeded' | 'failed' | 'skipped';

export interface ActionResult {
	action: Action;
	status: ActionStatus;
	error?: string;
	reason?: string;
	durationMs: number;
}

/**
 * Stable identity of an action target. Existing objects are identified by
 * runtime id so an orphan never shares an identity with its replacement.
 */
export function targetIdentity(target: ActionTarget): string {
	return target.id ? `${target.kind}#${target.id}` : `${target.kind}:${target.name}`;
}

export function describeTarget(target: ActionTarget): string {
	return target.service ?? target.name;
}
