/**
 * Health Check Executor
 *
 * Runs a single probe attempt:
 * - local:  TCP connect to the service container (address resolved through
 *           the runtime), or an HTTP GET on the container when a path is set
 * - remote: HTTP(S) GET against an external endpoint
 */

import net from 'net';
import axios from 'axios';
import { containerName, networkName } from '../config/topology';
import { errorMessage } from '../lib/errors';
import type { RuntimeDriver } from '../orchestrator/runtime-driver';
import type { HealthCheckDescriptor, HealthErrorClass, LocalHealthCheck, ProbeOutcome } from './types';

export interface HealthProber {
	probe(check: HealthCheckDescriptor, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome>;
}

/**
 * Failure classes of an HTTP probe, by where the endpoint lives
 */
interface HttpFailureClasses {
	unreachable: HealthErrorClass;
	badStatus: HealthErrorClass;
}

const LOCAL_HTTP_FAILURES: HttpFailureClasses = { unreachable: 'LocalUnhealthy', badStatus: 'LocalUnhealthy' };
const REMOTE_HTTP_FAILURES: HttpFailureClasses = { unreachable: 'RemoteUnreachable', badStatus: 'RemoteUnhealthy' };

export class HealthCheckExecutor implements HealthProber {
	constructor(
		private readonly driver?: RuntimeDriver,
		private readonly projectName?: string,
	) {}

	async probe(check: HealthCheckDescriptor, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome> {
		switch (check.kind) {
			case 'local':
				return this.executeLocalCheck(check, timeoutMs, signal);
			case 'remote':
				return this.executeHttpCheck(check.url, check.expectedStatus, REMOTE_HTTP_FAILURES, timeoutMs, signal);
		}
	}

	private async executeLocalCheck(check: LocalHealthCheck, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome> {
		let host: string | undefined;
		try {
			host = check.host ?? (await this.resolveHost(check.target));
		} catch (error) {
			return { success: false, errorClass: 'LocalUnhealthy', message: `Address lookup failed: ${errorMessage(error)}` };
		}

		if (!host) {
			return { success: false, errorClass: 'LocalUnhealthy', message: 'Container has no IP address' };
		}
		// The lookup may have outlived the attempt
		if (signal?.aborted) {
			return { success: false, errorClass: 'Cancelled', message: 'Probe cancelled' };
		}

		if (check.path) {
			const url = `http://${host}:${check.port}${check.path}`;
			return this.executeHttpCheck(url, check.expectedStatus, LOCAL_HTTP_FAILURES, timeoutMs, signal);
		}
		return this.executeTcpCheck(host, check.port, timeoutMs, signal);
	}

	/**
	 * Execute TCP socket health check
	 */
	private executeTcpCheck(address: string, port: number, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome> {
		return new Promise((resolve) => {
			const socket = new net.Socket();

			const finish = (outcome: ProbeOutcome) => {
				clearTimeout(timer);
				signal?.removeEventListener('abort', onAbort);
				socket.destroy();
				resolve(outcome);
			};
			const onAbort = () => finish({ success: false, errorClass: 'Cancelled', message: 'TCP probe cancelled' });

			const timer = setTimeout(() => {
				finish({ success: false, errorClass: 'LocalUnhealthy', message: 'TCP timeout' });
			}, timeoutMs);

			signal?.addEventListener('abort', onAbort, { once: true });

			socket.connect(port, address, () => {
				finish({ success: true, message: `TCP connected to ${address}:${port}` });
			});

			socket.on('error', (error) => {
				finish({ success: false, errorClass: 'LocalUnhealthy', message: `TCP error: ${error.message}` });
			});
		});
	}

	private async resolveHost(serviceName: string): Promise<string | undefined> {
		if (!this.driver || !this.projectName) {
			return undefined;
		}
		return this.driver.resolveAddress(containerName(this.projectName, serviceName), networkName(this.projectName));
	}

	/**
	 * Execute HTTP health check. A failed connection and an answer with an
	 * unexpected status are told apart through `failures`.
	 */
	private async executeHttpCheck(
		url: string,
		expected: number[] | undefined,
		failures: HttpFailureClasses,
		timeoutMs: number,
		signal?: AbortSignal,
	): Promise<ProbeOutcome> {
		const expectedStatus = expected ?? getDefaultStatusCodes();

		try {
			const response = await axios.get<string>(url, {
				timeout: timeoutMs,
				signal,
				responseType: 'text',
				transformResponse: (data: string) => data,
				validateStatus: () => true,
			});

			if (!expectedStatus.includes(response.status)) {
				return { success: false, errorClass: failures.badStatus, message: `Unexpected status: ${response.status}` };
			}

			const emptyResponse = isEmptyBody(response.data);
			return {
				success: true,
				emptyResponse,
				message: emptyResponse ? `HTTP ${response.status} with empty content` : `HTTP ${response.status}`,
			};
		} catch (error) {
			if (signal?.aborted) {
				return { success: false, errorClass: 'Cancelled', message: 'HTTP probe cancelled' };
			}
			const code = axios.isAxiosError(error) && error.code ? `${error.code}: ` : '';
			return { success: false, errorClass: failures.unreachable, message: `HTTP error: ${code}${errorMessage(error)}` };
		}
	}
}

/**
 * Default HTTP status codes considered successful (200-399)
 */
function getDefaultStatusCodes(): number[] {
	const codes: number[] = [];
	for (let i = 200; i < 400; i++) {
		codes.push(i);
	}
	return codes;
}

/**
 * A reachable endpoint that returned nothing useful: blank body, null, an
 * empty array/object, or an object whose collections are all empty
 * (e.g. `{"total":0,"plugins":[]}`)
 */
export function isEmptyBody(body: string | undefined): boolean {
	if (body === undefined || body.trim() === '') {
		return true;
	}

	let payload: unknown;
	try {
		payload = JSON.parse(body);
	} catch {
		return false;
	}
	return isEmptyPayload(payload);
}

function isEmptyPayload(value: unknown): boolean {
	if (value === null) {
		return true;
	}
	if (Array.isArray(value)) {
		return value.length === 0;
	}
	if (typeof value === 'object') {
		const entries = Object.values(value);
		const collections = entries.filter((entry) => typeof entry === 'object' && entry !== null);
		return entries.length === 0 || (collections.length > 0 && collections.every(isEmptyPayload));
	}
	return false;
}
