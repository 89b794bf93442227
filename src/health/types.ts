/**
 * Health Check Types
 *
 * Two target classes with different remediation:
 * - local:  reachability through the runtime (port or readiness endpoint on the service container)
 * - remote: reachability over the open network (HTTP status check on an external endpoint)
 */

export type HealthCheckLocality = 'local' | 'remote';

/**
 * Probe against a service container: a TCP connect, or an HTTP GET when a
 * path is given (e.g. a readiness endpoint such as "/console/api/ping")
 */
export interface LocalHealthCheck {
	kind: 'local';
	/** Service name (or dependency name) the check belongs to */
	target: string;
	port: number;
	/** Probe this host instead of resolving the container address through the runtime */
	host?: string;
	path?: string;
	expectedStatus?: number[]; // Default: [200-399]
}

/**
 * HTTP(S) GET against an external endpoint
 */
export interface RemoteHealthCheck {
	kind: 'remote';
	target: string;
	url: string;
	expectedStatus?: number[]; // Default: [200-399]
}

export type HealthCheckDescriptor = LocalHealthCheck | RemoteHealthCheck;

export type HealthStatus = 'healthy' | 'unhealthy' | 'timed-out' | 'cancelled';

export type HealthErrorClass =
	| 'LocalUnhealthy'
	| 'RemoteUnreachable'
	| 'RemoteUnhealthy'
	| 'TimedOut'
	| 'Cancelled';

/**
 * Outcome of one probe attempt
 */
export interface ProbeOutcome {
	success: boolean;
	message: string;
	/** Failure class of this attempt; unset on success */
	errorClass?: HealthErrorClass;
	/** Remote endpoint answered with an expected status but no content */
	emptyResponse?: boolean;
}

/**
 * Final per-target result of verification
 */
export interface HealthCheckResult {
	target: string;
	locality: HealthCheckLocality;
	attempts: number;
	status: HealthStatus;
	errorClass?: HealthErrorClass;
	lastError?: string;
	emptyResponse: boolean;
	durationMs: number;
}

export interface VerifyOptions {
	/** Overall budget for the whole verify call */
	timeoutMs: number;
	pollIntervalMs: number;
	maxAttempts: number;
	/** Upper bound for a single probe attempt */
	attemptTimeoutMs: number;
	/** Maximum number of targets polled at once */
	concurrency: number;
	signal?: AbortSignal;
}
