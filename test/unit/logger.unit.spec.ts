/**
 * Unit Tests for Logger, ComponentLogger and LocalLogBackend
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ComponentLogger } from '../../src/logging/component-logger';
import { LocalLogBackend } from '../../src/logging/local-backend';
import { Logger } from '../../src/logging/logger';
import type { LogBackend, LogMessage } from '../../src/logging/types';

describe('Logger', () => {
	let backend: LocalLogBackend;
	let logger: Logger;

	beforeEach(() => {
		backend = new LocalLogBackend();
		logger = new Logger(backend, 'info', { console: false });
	});

	it('should drop messages below the minimum level', async () => {
		await logger.debug('Probe attempt');
		await logger.info('Plan computed');
		logger.setLogLevel('warn');
		await logger.info('Action applied');
		await logger.warn('Action skipped');

		expect((await backend.getLogs()).map((log) => log.message)).toEqual(['Plan computed', 'Action skipped']);
	});

	it('should split the component from the rest of the context', async () => {
		await logger.info('Inventory refreshed', { component: 'RuntimeInventory', objects: 3 });

		const [entry] = await backend.getLogs();
		expect(entry).toMatchObject({
			level: 'info',
			message: 'Inventory refreshed',
			component: 'RuntimeInventory',
			context: { objects: 3 },
		});
		expect(entry.runId).toBeUndefined();
	});

	it('should attach error details on error', async () => {
		await logger.error('Reconciliation aborted', new Error('runtime gone'), { component: 'ReconciliationRunner' });

		const [entry] = await backend.getLogs();
		expect(entry.context?.error).toMatchObject({ name: 'Error', message: 'runtime gone' });
	});

	it('should tag messages with the current run id', async () => {
		logger.setRunId('run-1');
		await logger.info('Reconciliation started');
		logger.setRunId(undefined);
		await logger.info('Idle');

		expect((await backend.getLogs()).map((log) => log.runId)).toEqual(['run-1', undefined]);
	});

	it('should fan out to every backend and survive a failing one', async () => {
		const failing: LogBackend = {
			log: () => Promise.reject(new Error('disk full')),
			getLogs: async () => [],
			cleanup: async () => 0,
			getLogCount: async () => 0,
		};
		const second = new LocalLogBackend();
		const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
		const fanOut = new Logger([failing, backend, second], 'info', { console: false });

		await fanOut.info('Plan executed');

		expect(await backend.getLogCount()).toBe(1);
		expect(await second.getLogCount()).toBe(1);
		expect(errorSpy).toHaveBeenCalledTimes(1);
		errorSpy.mockRestore();
	});
});

describe('ComponentLogger', () => {
	it('should stamp its component name', async () => {
		const backend = new LocalLogBackend();
		const log = new ComponentLogger(new Logger(backend, 'debug', { console: false }), 'ReconciliationPlanner');

		log.debugSync('Plan computed', { actions: 4 });
		await log.info('Plan executed');

		expect((await backend.getLogs({ component: 'ReconciliationPlanner' })).map((entry) => entry.message)).toEqual([
			'Plan computed',
			'Plan executed',
		]);
	});

	it('should do nothing without a logger', async () => {
		const log = new ComponentLogger(undefined, 'ReconciliationPlanner');

		await expect(log.info('Plan computed')).resolves.toBeUndefined();
	});
});

describe('LocalLogBackend', () => {
	const entry = (overrides: Partial<LogMessage>): LogMessage => ({
		message: 'Action applied',
		timestamp: 1_000,
		level: 'info',
		component: 'ReconciliationExecutor',
		...overrides,
	});

	it('should assign ids and keep at most maxLogs entries', async () => {
		const backend = new LocalLogBackend({ maxLogs: 2 });

		await backend.log(entry({ message: 'first' }));
		await backend.log(entry({ message: 'second' }));
		await backend.log(entry({ message: 'third' }));

		expect((await backend.getLogs()).map((log) => [log.id, log.message])).toEqual([
			['log-2', 'second'],
			['log-3', 'third'],
		]);
	});

	it('should filter by level, run id, time and limit', async () => {
		const backend = new LocalLogBackend();
		await backend.log(entry({ message: 'a', level: 'warn', runId: 'run-1', timestamp: 1_000 }));
		await backend.log(entry({ message: 'b', level: 'info', runId: 'run-1', timestamp: 2_000 }));
		await backend.log(entry({ message: 'c', level: 'warn', runId: 'run-2', timestamp: 3_000 }));
		await backend.log(entry({ message: 'd', level: 'warn', runId: 'run-2', timestamp: 4_000 }));

		const messages = async (filter: Parameters<LocalLogBackend['getLogs']>[0]) =>
			(await backend.getLogs(filter)).map((log) => log.message);

		expect(await messages({ level: 'warn' })).toEqual(['a', 'c', 'd']);
		expect(await messages({ runId: 'run-1' })).toEqual(['a', 'b']);
		expect(await messages({ since: 2_500 })).toEqual(['c', 'd']);
		expect(await messages({ level: 'warn', limit: 1 })).toEqual(['d']);
	});

	it('should remove entries older than the cutoff', async () => {
		const backend = new LocalLogBackend();
		await backend.log(entry({ message: 'old', timestamp: Date.now() - 60_000 }));
		await backend.log(entry({ message: 'new', timestamp: Date.now() }));

		expect(await backend.cleanup(30_000)).toBe(1);
		expect((await backend.getLogs()).map((log) => log.message)).toEqual(['new']);
	});

	describe('file persistence', () => {
		let logDir: string;

		beforeEach(async () => {
			logDir = await fs.mkdtemp(path.join(os.tmpdir(), 'reconcile-logs-'));
		});

		afterEach(async () => {
			await fs.rm(logDir, { recursive: true, force: true });
		});

		const readLines = async (file: string): Promise<unknown[]> =>
			(await fs.readFile(path.join(logDir, file), 'utf-8'))
				.trim()
				.split('\n')
				.map((line): unknown => JSON.parse(line));

		it('should append one JSON line per message to the file of its run', async () => {
			const backend = new LocalLogBackend({ enableFilePersistence: true, logDir });
			await backend.initialize();

			await backend.log(entry({ message: 'loading layers' }));
			await backend.log(entry({ message: 'first', runId: 'run-1' }));
			await backend.log(entry({ message: 'second', runId: 'run-1' }));

			expect((await fs.readdir(logDir)).sort()).toEqual(['reconciler.log', 'run-run-1.log']);
			expect(await readLines('reconciler.log')).toEqual([{ ...entry({ message: 'loading layers' }), id: 'log-1' }]);
			expect(await readLines('run-run-1.log')).toEqual([
				{ ...entry({ message: 'first', runId: 'run-1' }), id: 'log-2' },
				{ ...entry({ message: 'second', runId: 'run-1' }), id: 'log-3' },
			]);
			expect(backend.logFileFor('run-1')).toBe(path.join(logDir, 'run-run-1.log'));
		});

		it('should write nothing before initialize()', async () => {
			const backend = new LocalLogBackend({ enableFilePersistence: true, logDir });

			await backend.log(entry({ message: 'early' }));

			expect(await fs.readdir(logDir)).toEqual([]);
			expect(await backend.getLogCount()).toBe(1);
		});
	});
});
