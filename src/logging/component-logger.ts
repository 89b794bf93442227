/**
 * Component Logger
 * ================
 *
 * Wrapper around Logger that stamps the component name on every call.
 * Components accept an optional Logger; without one, calls are no-ops.
 *
 * Usage:
 *   const log = new ComponentLogger(logger, 'ReconciliationExecutor');
 *   log.infoSync('Action applied', { action: 'start', target: 'api' });
 */

import type { Logger, LogContext } from './logger';

export class ComponentLogger {
	constructor(
		private readonly logger: Logger | undefined,
		private readonly component: string,
	) {}

	private mergeContext(context?: LogContext): LogContext {
		return {
			component: this.component,
			...context,
		};
	}

	async info(message: string, context?: LogContext): Promise<void> {
		await this.logger?.info(message, this.mergeContext(context));
	}

	debugSync(message: string, context?: LogContext): void {
		this.logger?.debugSync(message, this.mergeContext(context));
	}

	infoSync(message: string, context?: LogContext): void {
		this.logger?.infoSync(message, this.mergeContext(context));
	}

	warnSync(message: string, context?: LogContext): void {
		this.logger?.warnSync(message, this.mergeContext(context));
	}

	errorSync(message: string, error: Error | undefined, context?: LogContext): void {
		this.logger?.errorSync(message, error, this.mergeContext(context));
	}
}
