#!/usr/bin/env node

import * as path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ConfigLoader } from '../src/config/config-loader';
import { CONFIG_KEYS, type ConfigLayer, type ConfigValues } from '../src/config/types';
import { Logger, LocalLogBackend } from '../src/logging';
import { DockerDriver } from '../src/orchestrator/docker-driver';
import { ReconciliationRunner } from '../src/reconciliation-runner';
import type { DiagnosticReport, StageStatus, Verdict } from '../src/report/types';

const EXIT_CODES: Record<Verdict, number> = {
	Success: 0,
	PartialSuccess: 1,
	Failed: 2,
};

/**
 * CLI interface for the reconciler
 */
async function main(): Promise<number> {
	const argv = await yargs(hideBin(process.argv))
		.scriptName('stack-reconciler')
		.usage('Usage: $0 [options]\n\nReconcile the local deployment with its configuration and verify its dependencies')
		.option('config-dir', {
			alias: 'c',
			description: 'Directory holding defaults.json',
			type: 'string',
			default: 'config',
		})
		.option('override', {
			alias: 'o',
			description: 'JSON file applied on top of every other configuration layer',
			type: 'string',
		})
		.option('project', {
			alias: 'p',
			description: 'Project name used to scope runtime objects',
			type: 'string',
		})
		.option('timeout', {
			description: 'Overall health verification timeout (ms)',
			type: 'number',
		})
		.option('poll-interval', {
			description: 'Delay between health probe attempts (ms)',
			type: 'number',
		})
		.option('concurrency', {
			description: 'Dependencies probed at once',
			type: 'number',
		})
		.option('dry-run', {
			description: 'Print the plan without applying it',
			type: 'boolean',
			default: false,
		})
		.option('json', {
			description: 'Print the report as JSON',
			type: 'boolean',
			default: false,
		})
		.option('log-level', {
			alias: 'l',
			description: 'Log level (debug, info, warn, error)',
			type: 'string',
			choices: ['debug', 'info', 'warn', 'error'],
		})
		.option('log-dir', {
			description: 'Also write logs to files in this directory',
			type: 'string',
		})
		.strict()
		.help()
		.alias('help', 'h')
		.version()
		.alias('version', 'v')
		.parse();

	const backend = argv.logDir
		? new LocalLogBackend({ enableFilePersistence: true, logDir: argv.logDir })
		: new LocalLogBackend();
	await backend.initialize();
	// Keep stdout clean for JSON output
	const logger = new Logger(backend, 'info', { console: !argv.json });

	const loader = new ConfigLoader(
		{
			configDir: path.resolve(argv.configDir),
			...(argv.override ? { overrideFile: path.resolve(argv.override) } : {}),
		},
		logger,
	);

	const flags: ConfigValues = {};
	if (argv.project !== undefined) flags[CONFIG_KEYS.projectName] = argv.project;
	if (argv.timeout !== undefined) flags[CONFIG_KEYS.healthTimeoutMs] = argv.timeout;
	if (argv.pollInterval !== undefined) flags[CONFIG_KEYS.pollIntervalMs] = argv.pollInterval;
	if (argv.concurrency !== undefined) flags[CONFIG_KEYS.concurrency] = argv.concurrency;
	if (argv.logLevel !== undefined) flags[CONFIG_KEYS.logLevel] = argv.logLevel;

	const layers: ConfigLayer[] = [...loader.loadLayers(), { name: 'command-line', values: flags }];

	const controller = new AbortController();
	const shutdown = () => {
		logger.warnSync('Cancelling reconciliation...', { component: 'cli' });
		controller.abort();
	};
	process.once('SIGINT', shutdown);
	process.once('SIGTERM', shutdown);

	const runner = new ReconciliationRunner(new DockerDriver(undefined, logger), { logger });
	const report = await runner.run(layers, { signal: controller.signal, dryRun: argv.dryRun });

	process.off('SIGINT', shutdown);
	process.off('SIGTERM', shutdown);

	console.log(argv.json ? JSON.stringify(report, null, 2) : renderReport(report));
	return EXIT_CODES[report.verdict];
}

const STATUS_MARKS: Record<StageStatus, string> = {
	ok: '✅',
	warning: '⚠️ ',
	failed: '❌',
	'not-run': '⏭️ ',
};

export function renderReport(report: DiagnosticReport): string {
	const lines: string[] = [];
	lines.push(`Reconciliation ${report.dryRun ? '(dry run) ' : ''}finished: ${report.verdict}`);

	for (const stage of report.stages) {
		lines.push(`${STATUS_MARKS[stage.status]} ${stage.stage.padEnd(9)} ${stage.summary}`);
		for (const detail of stage.details) {
			lines.push(`     - ${detail}`);
		}
	}

	return lines.join('\n');
}

// Run CLI
if (require.main === module) {
	main()
		.then((code) => {
			process.exitCode = code;
		})
		.catch((error: unknown) => {
			console.error('Error:', error instanceof Error ? error.message : String(error));
			process.exitCode = EXIT_CODES.Failed;
		});
}
