import type { ConfigIssue } from '../config/types';
import type { HealthCheckResult } from '../health/types';
import type { Action, ActionResult, InventoryRecord } from '../orchestrator/types';

export type Verdict = 'Success' | 'PartialSuccess' | 'Failed';

export type StageName = 'config' | 'inventory' | 'plan' | 'execute' | 'verify';

export const STAGES: readonly StageName[] = ['config', 'inventory', 'plan', 'execute', 'verify'];

export type StageStatus = 'ok' | 'warning' | 'failed' | 'not-run';

export interface StageSummary {
	stage: StageName;
	status: StageStatus;
	/** One-line summary */
	summary: string;
	details: string[];
}

/**
 * Error that stopped the run, and the stage it stopped in
 */
export interface FatalFailure {
	stage: StageName;
	error: Error;
}

export interface ReportOptions {
	/** The computed plan; defaults to the actions found in the results */
	plan?: readonly Action[];
	/** Planning ran but nothing was applied */
	dryRun?: boolean;
}

/**
 * Read-only aggregate of one reconciliation run
 */
export interface DiagnosticReport {
	verdict: Verdict;
	generatedAt: string;
	dryRun: boolean;
	stages: StageSummary[];
	fatalError?: {
		stage: StageName;
		code: string;
		message: string;
	};
	configIssues: readonly ConfigIssue[];
	inventory: readonly InventoryRecord[];
	plan: readonly Action[];
	actionResults: readonly ActionResult[];
	healthResults: readonly HealthCheckResult[];
}
