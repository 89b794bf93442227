/**
 * Local Log Backend
 *
 * Keeps the most recent messages in memory. With persistence enabled, every
 * message is also appended as one JSON line to a file per reconciliation run
 * (`run-<runId>.log`); messages logged outside a run go to `reconciler.log`.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { LogMessage, LogFilter, LogBackend } from './types';

export interface LocalLogBackendOptions {
	/** Maximum number of messages kept in memory */
	maxLogs?: number;
	enableFilePersistence?: boolean;
	/** Directory for log files */
	logDir?: string;
}

const UNSCOPED_LOG_FILE = 'reconciler.log';

export class LocalLogBackend implements LogBackend {
	private logs: LogMessage[] = [];
	private nextId = 1;
	private readonly maxLogs: number;
	private readonly logDir?: string;
	private ready = false;

	constructor(options: LocalLogBackendOptions = {}) {
		this.maxLogs = options.maxLogs ?? 10_000;
		if (options.enableFilePersistence) {
			this.logDir = options.logDir ?? './logs';
		}
	}

	/**
	 * Create the log directory; until then nothing is written to disk
	 */
	public async initialize(): Promise<void> {
		if (this.logDir) {
			await fs.mkdir(this.logDir, { recursive: true });
			this.ready = true;
		}
	}

	/**
	 * Path of the file a run's messages are written to, if persisting
	 */
	public logFileFor(runId?: string): string | undefined {
		if (!this.logDir) {
			return undefined;
		}
		return path.join(this.logDir, runId ? `run-${runId}.log` : UNSCOPED_LOG_FILE);
	}

	public async log(message: LogMessage): Promise<void> {
		const entry: LogMessage = { ...message, id: message.id ?? `log-${this.nextId++}` };

		this.logs.push(entry);
		if (this.logs.length > this.maxLogs) {
			this.logs.splice(0, this.logs.length - this.maxLogs);
		}

		const file = this.ready ? this.logFileFor(entry.runId) : undefined;
		if (file) {
			try {
				await fs.appendFile(file, `${JSON.stringify(entry)}\n`, 'utf-8');
			} catch (error) {
				console.error('Failed to write log to file:', error);
			}
		}
	}

	public async getLogs(filter: LogFilter = {}): Promise<LogMessage[]> {
		const { component, level, runId, since, limit } = filter;

		const matching = this.logs.filter(
			(log) =>
				(component === undefined || log.component === component) &&
				(level === undefined || log.level === level) &&
				(runId === undefined || log.runId === runId) &&
				(since === undefined || log.timestamp >= since),
		);

		return limit !== undefined && limit > 0 ? matching.slice(-limit) : matching;
	}

	public async cleanup(olderThanMs: number): Promise<number> {
		const cutoff = Date.now() - olderThanMs;
		const before = this.logs.length;
		this.logs = this.logs.filter((log) => log.timestamp >= cutoff);
		return before - this.logs.length;
	}

	public async getLogCount(): Promise<number> {
		return this.logs.length;
	}
}
