/**
 * DEPENDENCY HEALTH VERIFIER
 * ==========================
 *
 * Polls local and remote dependencies until each is healthy, the overall
 * deadline passes, or its attempts run out. Targets are checked through a
 * bounded worker pool; every attempt is bounded by
 * min(attemptTimeoutMs, time left before the deadline).
 *
 * Aborting the caller's signal stops in-flight probes and returns at once,
 * with every unfinished target reported as cancelled.
 */

import { delay } from '../lib/delay';
import { errorMessage } from '../lib/errors';
import type { Logger } from '../logging/logger';
import { ComponentLogger } from '../logging/component-logger';
import type { HealthProber } from './health-check-executor';
import type { HealthCheckDescriptor, HealthCheckResult, HealthErrorClass, ProbeOutcome, VerifyOptions } from './types';

interface PollProgress {
	startedAt: number;
	attempts: number;
	last?: ProbeOutcome;
}

export class DependencyHealthVerifier {
	private readonly log: ComponentLogger;

	constructor(
		private readonly prober: HealthProber,
		logger?: Logger,
	) {
		this.log = new ComponentLogger(logger, 'DependencyHealthVerifier');
	}

	public async verifyOne(target: HealthCheckDescriptor, options: VerifyOptions): Promise<HealthCheckResult> {
		const [result] = await this.verify([target], options);
		return result;
	}

	/**
	 * Results are returned in the order of `targets`
	 */
	public async verify(targets: readonly HealthCheckDescriptor[], options: VerifyOptions): Promise<HealthCheckResult[]> {
		if (targets.length === 0) {
			return [];
		}

		const deadline = Date.now() + options.timeoutMs;
		// Aborted by the deadline or by the caller
		const controller = new AbortController();
		const stop = () => controller.abort();
		const deadlineTimer = setTimeout(stop, options.timeoutMs);
		if (options.signal?.aborted) {
			stop();
		} else {
			options.signal?.addEventListener('abort', stop, { once: true });
		}

		const results = new Map<number, HealthCheckResult>();
		const progress = new Map<number, PollProgress>();
		let next = 0;

		const worker = async (): Promise<void> => {
			while (next < targets.length && !controller.signal.aborted) {
				const index = next++;
				const state: PollProgress = { startedAt: Date.now(), attempts: 0 };
				progress.set(index, state);
				results.set(index, await this.poll(targets[index], state, deadline, options, controller.signal));
			}
		};

		const aborted = new Promise<void>((resolve) => {
			if (controller.signal.aborted) {
				resolve();
				return;
			}
			controller.signal.addEventListener('abort', () => resolve(), { once: true });
		});

		const workerCount = Math.max(1, Math.min(options.concurrency, targets.length));
		try {
			await Promise.race([Promise.all(Array.from({ length: workerCount }, worker)), aborted]);
		} finally {
			clearTimeout(deadlineTimer);
			options.signal?.removeEventListener('abort', stop);
		}

		const final = targets.map(
			(target, index) =>
				results.get(index) ?? this.unfinished(target, progress.get(index), options.signal?.aborted === true),
		);

		for (const result of final) {
			this.logResult(result);
		}

		return final;
	}

	private async poll(
		target: HealthCheckDescriptor,
		state: PollProgress,
		deadline: number,
		options: VerifyOptions,
		signal: AbortSignal,
	): Promise<HealthCheckResult> {
		while (!signal.aborted) {
			const remaining = deadline - Date.now();
			if (remaining <= 0) {
				break;
			}

			state.attempts++;
			const outcome = await this.attempt(target, Math.min(options.attemptTimeoutMs, remaining), signal);
			if (signal.aborted && !outcome.success) {
				// Interrupted attempt says nothing about the target
				break;
			}
			state.last = outcome;

			this.log.debugSync('Health probe attempt', {
				target: target.target,
				attempt: state.attempts,
				success: outcome.success,
				message: outcome.message,
			});

			if (outcome.success) {
				return this.result(target, state, 'healthy');
			}
			if (state.attempts >= options.maxAttempts) {
				return this.result(target, state, 'unhealthy', outcome.errorClass ?? failureClass(target));
			}

			await delay(Math.min(options.pollIntervalMs, Math.max(0, deadline - Date.now())), signal);
		}

		return this.unfinished(target, state, options.signal?.aborted === true);
	}

	private async attempt(target: HealthCheckDescriptor, timeoutMs: number, signal: AbortSignal): Promise<ProbeOutcome> {
		try {
			return await this.prober.probe(target, timeoutMs, signal);
		} catch (error) {
			return { success: false, errorClass: failureClass(target), message: errorMessage(error) };
		}
	}

	/**
	 * Result for a target whose polling was ended by the deadline or the caller
	 */
	private unfinished(target: HealthCheckDescriptor, state: PollProgress | undefined, cancelled: boolean): HealthCheckResult {
		const progress = state ?? { startedAt: Date.now(), attempts: 0 };
		if (cancelled) {
			return this.result(target, progress, 'cancelled', 'Cancelled');
		}
		// Only a deadline that struck before any attempt completed is a plain timeout
		return this.result(target, progress, 'timed-out', progress.last?.errorClass ?? 'TimedOut');
	}

	private result(
		target: HealthCheckDescriptor,
		state: PollProgress,
		status: HealthCheckResult['status'],
		errorClass?: HealthErrorClass,
	): HealthCheckResult {
		const lastError = state.last && !state.last.success ? state.last.message : undefined;
		return {
			target: target.target,
			locality: target.kind,
			attempts: state.attempts,
			status,
			...(errorClass ? { errorClass } : {}),
			...(status !== 'healthy' && lastError ? { lastError } : {}),
			emptyResponse: status === 'healthy' && state.last?.emptyResponse === true,
			durationMs: Date.now() - state.startedAt,
		};
	}

	private logResult(result: HealthCheckResult): void {
		const context = {
			target: result.target,
			locality: result.locality,
			attempts: result.attempts,
			durationMs: result.durationMs,
		};

		if (result.status === 'healthy') {
			if (result.emptyResponse) {
				this.log.warnSync('Dependency reachable but returned no content', context);
			} else {
				this.log.infoSync('Dependency healthy', context);
			}
			return;
		}

		this.log.warnSync('Dependency not healthy', {
			...context,
			status: result.status,
			errorClass: result.errorClass,
			lastError: result.lastError,
		});
	}
}

function failureClass(target: HealthCheckDescriptor): HealthErrorClass {
	return target.kind === 'local' ? 'LocalUnhealthy' : 'RemoteUnreachable';
}
