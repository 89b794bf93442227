/**
 * Logging types and interfaces
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMessage {
	/** Unique log message ID */
	id?: string;
	message: string;
	/** Timestamp in milliseconds since epoch */
	timestamp: number;
	level: LogLevel;
	/** Component that produced the message */
	component: string;
	/** Reconciliation run the message belongs to */
	runId?: string;
	context?: Record<string, unknown>;
}

export interface LogFilter {
	component?: string;
	level?: LogLevel;
	runId?: string;
	/** Start timestamp (ms) - logs after this time */
	since?: number;
	/** Maximum number of logs to return (most recent) */
	limit?: number;
}

export interface LogBackend {
	/** Store a log message */
	log(message: LogMessage): Promise<void>;
	/** Retrieve logs matching filter */
	getLogs(filter?: LogFilter): Promise<LogMessage[]>;
	/** Clear old logs */
	cleanup(olderThanMs: number): Promise<number>;
	/** Get total number of stored logs */
	getLogCount(): Promise<number>;
}
