/**
 * Stack reconciler
 *
 * Brings a single-host multi-service deployment to its configured state and
 * verifies the dependencies it needs.
 */

export { ReconciliationRunner } from './reconciliation-runner';
export type { RunOptions, RunnerOptions } from './reconciliation-runner';

// Configuration
export { ConfigResolver } from './config/config-resolver';
export type { ConfigSnapshot } from './config/config-resolver';
export { ConfigLoader } from './config/config-loader';
export type { ConfigLoaderOptions } from './config/config-loader';
export { Topology, LABELS, containerName, networkName, volumeName, specHash } from './config/topology';
export * from './config/types';

// Runtime
export type { RuntimeDriver } from './orchestrator/runtime-driver';
export { BaseRuntimeDriver } from './orchestrator/runtime-driver';
export { DockerDriver } from './orchestrator/docker-driver';
export { RuntimeInventory } from './orchestrator/runtime-inventory';
export { ReconciliationPlanner, topologicalOrder } from './orchestrator/reconciliation-planner';
export type { PlannerOptions } from './orchestrator/reconciliation-planner';
export { ReconciliationExecutor } from './orchestrator/reconciliation-executor';
export type { ExecutorOptions, ReadinessGate } from './orchestrator/reconciliation-executor';
export * from './orchestrator/types';

// Health
export { HealthCheckExecutor, isEmptyBody } from './health/health-check-executor';
export type { HealthProber } from './health/health-check-executor';
export { DependencyHealthVerifier } from './health/dependency-health-verifier';
export * from './health/types';

// Report
export { DiagnosticReporter, computeVerdict } from './report/diagnostic-reporter';
export * from './report/types';

export * from './lib/errors';
export * from './logging';
