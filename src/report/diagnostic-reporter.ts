/**
 * DIAGNOSTIC REPORTER
 * ===================
 *
 * Pure aggregation of every stage's output into one report with a summary
 * per stage and a terminal verdict. The verdict is a strict fold over all
 * results: a run that recorded any failure is never reported as Success.
 */

import type { ConfigIssue } from '../config/types';
import type { HealthCheckResult } from '../health/types';
import { ReconcilerError } from '../lib/errors';
import { describeTarget, type Action, type ActionResult, type InventoryRecord } from '../orchestrator/types';
import {
	STAGES,
	type DiagnosticReport,
	type FatalFailure,
	type ReportOptions,
	type StageName,
	type StageSummary,
	type Verdict,
} from './types';

export class DiagnosticReporter {
	public report(
		configIssues: readonly ConfigIssue[],
		inventory: readonly InventoryRecord[],
		actionResults: readonly ActionResult[],
		healthResults: readonly HealthCheckResult[],
		fatal?: FatalFailure,
		options: ReportOptions = {},
	): DiagnosticReport {
		const dryRun = options.dryRun === true;
		const plan = options.plan ?? actionResults.map((result) => result.action);
		const fatalIndex = fatal ? STAGES.indexOf(fatal.stage) : STAGES.length;

		const stages = STAGES.map((stage, index): StageSummary => {
			if (fatal && index === fatalIndex) {
				return { stage, status: 'failed', summary: describeFatal(fatal.error), details: [] };
			}
			if (index > fatalIndex || (dryRun && (stage === 'execute' || stage === 'verify'))) {
				return { stage, status: 'not-run', summary: 'Not run', details: [] };
			}
			return summarize(stage, { configIssues, inventory, plan, actionResults, healthResults });
		});

		return {
			verdict: computeVerdict(inventory, actionResults, healthResults, fatal),
			generatedAt: new Date().toISOString(),
			dryRun,
			stages,
			...(fatal
				? { fatalError: { stage: fatal.stage, code: errorCode(fatal.error), message: fatal.error.message } }
				: {}),
			configIssues,
			inventory,
			plan,
			actionResults,
			healthResults,
		};
	}
}

/**
 * - Failed: a fatal error, any skipped action, or no desired service came up clean
 * - PartialSuccess: at least one failed action or unhealthy dependency otherwise
 * - Success: nothing failed
 */
export function computeVerdict(
	inventory: readonly InventoryRecord[],
	actionResults: readonly ActionResult[],
	healthResults: readonly HealthCheckResult[],
	fatal?: FatalFailure,
): Verdict {
	if (fatal) {
		return 'Failed';
	}

	const failedActions = actionResults.filter((result) => result.status === 'failed');
	const skippedActions = actionResults.filter((result) => result.status === 'skipped');
	const unhealthy = healthResults.filter((result) => result.status !== 'healthy');

	if (failedActions.length === 0 && skippedActions.length === 0 && unhealthy.length === 0) {
		return 'Success';
	}
	if (skippedActions.length > 0) {
		return 'Failed';
	}

	const troubled = new Set([
		...failedActions.map((result) => describeTarget(result.action.target)),
		...unhealthy.map((result) => result.target),
	]);
	const desiredServices = desiredServiceNames(inventory);
	if (desiredServices.length > 0 && desiredServices.every((service) => troubled.has(service))) {
		return 'Failed';
	}

	return 'PartialSuccess';
}

// ============================================================================
// Stage summaries
// ============================================================================

interface StageInput {
	configIssues: readonly ConfigIssue[];
	inventory: readonly InventoryRecord[];
	plan: readonly Action[];
	actionResults: readonly ActionResult[];
	healthResults: readonly HealthCheckResult[];
}

function summarize(stage: StageName, input: StageInput): StageSummary {
	switch (stage) {
		case 'config':
			return summarizeConfig(input.configIssues);
		case 'inventory':
			return summarizeInventory(input.inventory);
		case 'plan':
			return summarizePlan(input.plan);
		case 'execute':
			return summarizeExecution(input.actionResults);
		case 'verify':
			return summarizeVerification(input.healthResults);
	}
}

function summarizeConfig(issues: readonly ConfigIssue[]): StageSummary {
	if (issues.length === 0) {
		return { stage: 'config', status: 'ok', summary: 'Configuration resolved', details: [] };
	}
	return {
		stage: 'config',
		status: 'warning',
		summary: `Configuration resolved with ${issues.length} warning(s)`,
		details: issues.map((issue) => `${issue.code}: ${issue.message}`),
	};
}

function summarizeInventory(inventory: readonly InventoryRecord[]): StageSummary {
	const count = (state: InventoryRecord['state']) => inventory.filter((record) => record.state === state).length;
	const orphans = inventory.filter((record) => record.state === 'orphaned');

	return {
		stage: 'inventory',
		status: orphans.length > 0 ? 'warning' : 'ok',
		summary: `${inventory.length} object(s): ${count('running')} running, ${count('created') + count('stopped')} idle, ${count('absent')} absent, ${orphans.length} orphaned`,
		details: orphans.map((record) => `orphaned ${record.kind} ${record.name}: ${record.lastError ?? 'unknown reason'}`),
	};
}

function summarizePlan(plan: readonly Action[]): StageSummary {
	if (plan.length === 0) {
		return { stage: 'plan', status: 'ok', summary: 'Nothing to do, runtime already converged', details: [] };
	}
	return {
		stage: 'plan',
		status: 'ok',
		summary: `${plan.length} action(s) planned`,
		details: plan.map((action) => `[${action.rank}] ${action.kind} ${action.target.kind} ${action.target.name}`),
	};
}

function summarizeExecution(results: readonly ActionResult[]): StageSummary {
	const succeeded = results.filter((result) => result.status === 'succeeded').length;
	const problems = results.filter((result) => result.status !== 'succeeded');

	return {
		stage: 'execute',
		status: problems.length > 0 ? 'failed' : 'ok',
		summary: `${succeeded} succeeded, ${problems.filter((result) => result.status === 'failed').length} failed, ${problems.filter((result) => result.status === 'skipped').length} skipped`,
		details: problems.map(
			(result) =>
				`${result.action.kind} ${describeTarget(result.action.target)}: ${result.status} (${result.error ?? result.reason ?? 'no reason recorded'})`,
		),
	};
}

function summarizeVerification(results: readonly HealthCheckResult[]): StageSummary {
	const healthy = results.filter((result) => result.status === 'healthy');
	const empty = healthy.filter((result) => result.emptyResponse);
	const unhealthy = results.filter((result) => result.status !== 'healthy');

	return {
		stage: 'verify',
		status: unhealthy.length > 0 ? 'failed' : empty.length > 0 ? 'warning' : 'ok',
		summary: `${healthy.length} of ${results.length} dependencies healthy`,
		details: [
			...unhealthy.map(
				(result) =>
					`${result.target} (${result.locality}): ${result.status} after ${result.attempts} attempt(s)` +
					(result.errorClass ? `, ${result.errorClass}` : '') +
					(result.lastError ? `: ${result.lastError}` : ''),
			),
			...empty.map((result) => `${result.target} (${result.locality}): reachable but returned no content`),
		],
	};
}

// ============================================================================
// Helpers
// ============================================================================

function desiredServiceNames(inventory: readonly InventoryRecord[]): string[] {
	const names = inventory
		.filter((record) => record.kind === 'container' && record.state !== 'orphaned')
		.map((record) => record.service)
		.filter((service): service is string => service !== undefined);
	return [...new Set(names)];
}

function errorCode(error: Error): string {
	return error instanceof ReconcilerError ? error.code : error.name;
}

function describeFatal(error: Error): string {
	return `${errorCode(error)}: ${error.message}`;
}
