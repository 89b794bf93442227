/**
 * Logger
 * ======
 *
 * Structured logging for reconciliation runs. Every message goes to the
 * console and is fanned out to the configured LogBackends.
 *
 * Usage:
 *   const logger = new Logger(new LocalLogBackend(), 'debug');
 *   logger.infoSync('Plan computed', { component: 'ReconciliationPlanner', actions: 4 });
 *   await logger.error('Refresh failed', error, { component: 'RuntimeInventory' });
 */

import type { LogBackend, LogLevel, LogMessage } from './types';

export interface LogContext {
	component?: string;
	operation?: string;
	[key: string]: unknown;
}

// Log level hierarchy for filtering
const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export class Logger {
	private backends: LogBackend[];
	private runId?: string;
	private minLogLevel: LogLevel;
	private console: boolean;

	constructor(
		backends: LogBackend | LogBackend[] = [],
		initialLogLevel: LogLevel = 'info',
		options: { console?: boolean } = {},
	) {
		this.backends = Array.isArray(backends) ? backends : [backends];
		this.minLogLevel = initialLogLevel;
		this.console = options.console ?? true;
	}

	/**
	 * Tag every following message with a run id
	 */
	public setRunId(runId: string | undefined): void {
		this.runId = runId;
	}

	public setLogLevel(level: LogLevel): void {
		this.minLogLevel = level;
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVELS[level] >= LOG_LEVELS[this.minLogLevel];
	}

	public async debug(message: string, context?: LogContext): Promise<void> {
		await this.log('debug', message, context);
	}

	public async info(message: string, context?: LogContext): Promise<void> {
		await this.log('info', message, context);
	}

	public async warn(message: string, context?: LogContext): Promise<void> {
		await this.log('warn', message, context);
	}

	public async error(message: string, error?: Error, context?: LogContext): Promise<void> {
		await this.log('error', message, { ...context, ...errorContext(error) });
	}

	/**
	 * Core logging method. Resolves once every backend has stored the message;
	 * a failing backend never fails the caller.
	 */
	private async log(level: LogLevel, message: string, context?: LogContext): Promise<void> {
		if (!this.shouldLog(level)) {
			return;
		}

		const { component = 'reconciler', ...rest } = context ?? {};
		const logMessage: LogMessage = {
			timestamp: Date.now(),
			level,
			message,
			component: String(component),
			...(this.runId ? { runId: this.runId } : {}),
			...(Object.keys(rest).length > 0 ? { context: rest } : {}),
		};

		if (this.console) {
			this.consoleLog(logMessage);
		}

		await Promise.all(
			this.backends.map((backend) =>
				backend.log(logMessage).catch((err: unknown) => {
					console.error('[Logger] Failed to log to backend:', err);
				}),
			),
		);
	}

	/**
	 * Console output
	 */
	private consoleLog(entry: LogMessage): void {
		const timestamp = new Date(entry.timestamp).toISOString();
		let output = `${timestamp} [${entry.level.toUpperCase()}] [${entry.component}] ${entry.message}`;

		if (entry.context) {
			output += ` ${JSON.stringify(entry.context)}`;
		}

		switch (entry.level) {
			case 'debug':
			case 'info':
				console.log(output);
				break;
			case 'warn':
				console.warn(output);
				break;
			case 'error':
				console.error(output);
				break;
		}
	}

	/**
	 * Synchronous log methods (for places where awaiting is awkward).
	 * Backend writes complete in the background.
	 */
	public debugSync(message: string, context?: LogContext): void {
		void this.log('debug', message, context);
	}

	public infoSync(message: string, context?: LogContext): void {
		void this.log('info', message, context);
	}

	public warnSync(message: string, context?: LogContext): void {
		void this.log('warn', message, context);
	}

	public errorSync(message: string, error?: Error, context?: LogContext): void {
		void this.log('error', message, { ...context, ...errorContext(error) });
	}
}

function errorContext(error?: Error): LogContext {
	return error
		? {
				error: {
					name: error.name,
					message: error.message,
					stack: error.stack,
				},
			}
		: {};
}
