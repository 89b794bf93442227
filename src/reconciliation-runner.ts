/**
 * RECONCILIATION RUNNER
 * =====================
 *
 * One run is a fresh Resolve → Refresh → Plan → Execute → Verify → Report
 * cycle. Stages run strictly in sequence; each needs the full output of the
 * previous one.
 *
 * Fatal errors (configuration, runtime unreachable, dependency cycle) stop
 * the run before anything is mutated. Execution and verification failures
 * are recorded and only surface in the report.
 *
 * Events:
 *   stage-started     (stage)
 *   stage-completed   (stage, durationMs)
 *   action-completed  (ActionResult)
 *   report-ready      (DiagnosticReport)
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { ConfigResolver, type ConfigSnapshot } from './config/config-resolver';
import type { ConfigLayer } from './config/types';
import { DependencyHealthVerifier } from './health/dependency-health-verifier';
import { HealthCheckExecutor, type HealthProber } from './health/health-check-executor';
import type { HealthCheckDescriptor, HealthCheckResult, VerifyOptions } from './health/types';
import { toError } from './lib/errors';
import type { Logger } from './logging/logger';
import { ComponentLogger } from './logging/component-logger';
import { ReconciliationExecutor } from './orchestrator/reconciliation-executor';
import { ReconciliationPlanner } from './orchestrator/reconciliation-planner';
import type { RuntimeDriver } from './orchestrator/runtime-driver';
import { RuntimeInventory } from './orchestrator/runtime-inventory';
import { describeTarget, type Action, type ActionResult, type InventoryRecord } from './orchestrator/types';
import { DiagnosticReporter } from './report/diagnostic-reporter';
import type { DiagnosticReport, FatalFailure, StageName } from './report/types';

export interface RunnerOptions {
	logger?: Logger;
	/** Probe implementation; defaults to TCP/HTTP probes through the driver */
	prober?: HealthProber;
}

export interface RunOptions {
	signal?: AbortSignal;
	/** Stop after planning */
	dryRun?: boolean;
}

interface RunnerEvents {
	'stage-started': (stage: StageName) => void;
	'stage-completed': (stage: StageName, durationMs: number) => void;
	'action-completed': (result: ActionResult) => void;
	'report-ready': (report: DiagnosticReport) => void;
}

export class ReconciliationRunner extends EventEmitter {
	private readonly logger?: Logger;
	private readonly log: ComponentLogger;
	private readonly prober?: HealthProber;
	private readonly reporter = new DiagnosticReporter();

	constructor(
		private readonly driver: RuntimeDriver,
		options: RunnerOptions = {},
	) {
		super();
		this.logger = options.logger;
		this.prober = options.prober;
		this.log = new ComponentLogger(options.logger, 'ReconciliationRunner');
	}

	public async run(layers: readonly ConfigLayer[], options: RunOptions = {}): Promise<DiagnosticReport> {
		const runId = randomUUID();
		const startedAt = Date.now();
		this.logger?.setRunId(runId);
		this.log.infoSync('Reconciliation started', { runId, dryRun: options.dryRun === true });

		let snapshot: ConfigSnapshot | undefined;
		let inventory: InventoryRecord[] = [];
		let plan: Action[] = [];
		let actionResults: ActionResult[] = [];
		let healthResults: HealthCheckResult[] = [];
		let fatal: FatalFailure | undefined;
		let current: StageName = 'config';
		const stage = <T>(name: StageName, work: () => T | Promise<T>): Promise<T> => {
			current = name;
			return this.timed(name, work);
		};

		try {
			const resolved = await stage('config', () => new ConfigResolver(this.logger).resolve(layers));
			snapshot = resolved;
			this.logger?.setLogLevel(resolved.settings.logLevel);

			const { settings, topology } = resolved;
			const inventoryStage = new RuntimeInventory(this.driver, settings.projectName, this.logger);
			inventory = await stage('inventory', () => inventoryStage.refresh(topology));

			const planner = new ReconciliationPlanner(
				{ projectName: settings.projectName, pruneOrphanVolumes: settings.pruneOrphanVolumes },
				this.logger,
			);
			plan = await stage('plan', () => planner.plan(topology, inventory));

			if (!options.dryRun) {
				const verifier = new DependencyHealthVerifier(
					this.prober ?? new HealthCheckExecutor(this.driver, settings.projectName),
					this.logger,
				);
				const verifyOptions: VerifyOptions = {
					timeoutMs: settings.healthTimeoutMs,
					pollIntervalMs: settings.pollIntervalMs,
					maxAttempts: settings.maxAttempts,
					attemptTimeoutMs: settings.attemptTimeoutMs,
					concurrency: settings.concurrency,
					signal: options.signal,
				};

				const readiness = new Map<string, HealthCheckResult>();
				const executor = new ReconciliationExecutor(
					this.driver,
					{
						projectName: settings.projectName,
						topology,
						readiness: async (check) => {
							const result = await verifier.verifyOne(check, verifyOptions);
							readiness.set(check.target, result);
							return result;
						},
					},
					this.logger,
				);
				executor.on('action-completed', (result) => this.emit('action-completed', result));

				actionResults = await stage('execute', () => executor.execute(plan, options.signal));
				healthResults = await stage('verify', () =>
					this.verify(resolved, actionResults, readiness, verifier, verifyOptions),
				);
			}
		} catch (error) {
			fatal = { stage: current, error: toError(error) };
			this.log.errorSync('Reconciliation aborted', fatal.error, { runId, stage: fatal.stage });
		}

		const report = this.reporter.report(snapshot?.issues ?? [], inventory, actionResults, healthResults, fatal, {
			plan,
			dryRun: options.dryRun === true,
		});

		// Flushed to the backends before the report is handed out
		await this.log.info('Reconciliation finished', {
			runId,
			verdict: report.verdict,
			durationMs: Date.now() - startedAt,
		});
		this.logger?.setRunId(undefined);

		this.emit('report-ready', report);
		return report;
	}

	/**
	 * Health checks of every service whose actions went through, plus the
	 * external dependencies. A dependency the readiness gate already found
	 * unhealthy is reported as is instead of being polled again.
	 */
	private async verify(
		snapshot: ConfigSnapshot,
		actionResults: readonly ActionResult[],
		readiness: ReadonlyMap<string, HealthCheckResult>,
		verifier: DependencyHealthVerifier,
		verifyOptions: VerifyOptions,
	): Promise<HealthCheckResult[]> {
		const troubled = new Set(
			actionResults
				.filter((result) => result.status !== 'succeeded')
				.map((result) => describeTarget(result.action.target)),
		);

		const checks: HealthCheckDescriptor[] = [
			...snapshot.topology.services
				.filter((service) => !troubled.has(service.name))
				.flatMap((service) => (service.healthCheck ? [service.healthCheck] : [])),
			...snapshot.externalDependencies,
		];

		const known: HealthCheckResult[] = [];
		const pending: HealthCheckDescriptor[] = [];
		for (const check of checks) {
			const gated = readiness.get(check.target);
			if (gated && gated.status !== 'healthy') {
				known.push(gated);
			} else {
				pending.push(check);
			}
		}

		const polled = await verifier.verify(pending, verifyOptions);
		return checks.map(
			(check) =>
				known.find((result) => result.target === check.target) ??
				polled[pending.indexOf(check)],
		);
	}

	private async timed<T>(stage: StageName, work: () => T | Promise<T>): Promise<T> {
		const startedAt = Date.now();
		this.emit('stage-started', stage);

		const result = await work();

		const durationMs = Date.now() - startedAt;
		this.log.debugSync('Stage completed', { stage, durationMs });
		this.emit('stage-completed', stage, durationMs);
		return result;
	}

	// Typed event emitter methods
	public on<K extends keyof RunnerEvents>(event: K, listener: RunnerEvents[K]): this {
		return super.on(event, listener);
	}

	public emit<K extends keyof RunnerEvents>(event: K, ...args: Parameters<RunnerEvents[K]>): boolean {
		return super.emit(event, ...args);
	}
}
