/**
 * Unit Tests for ConfigResolver
 *
 * Layer precedence, required keys, structured values from env files,
 * topology validation and template warnings. Pure: no files involved.
 */

import { ConfigResolver } from '../../src/config/config-resolver';
import type { ConfigLayer } from '../../src/config/types';
import { ConfigError } from '../../src/lib/errors';

function resolveError(layers: ConfigLayer[]): ConfigError {
	try {
		new ConfigResolver().resolve(layers);
	} catch (error) {
		if (error instanceof ConfigError) {
			return error;
		}
		throw error;
	}
	throw new Error('expected resolve() to fail');
}

describe('ConfigResolver', () => {
	const resolver = new ConfigResolver();

	describe('layer precedence', () => {
		it('should let the later layer win for the same key', () => {
			const snapshot = resolver.resolve([
				{ name: 'defaults', values: { X: 1, TOPOLOGY: [] } },
				{ name: 'user-override', values: { X: 2 } },
			]);

			expect(snapshot.values.X).toBe(2);
			expect(snapshot.sources.X).toBe('user-override');
			expect(snapshot.sources.TOPOLOGY).toBe('defaults');
			expect(snapshot.layers).toEqual(['defaults', 'user-override']);
		});

		it('should fail with MissingBaseLayer when no defaults layer is given', () => {
			const error = resolveError([{ name: 'user-override', values: { TOPOLOGY: [] } }]);

			expect(error.code).toBe('MissingBaseLayer');
			expect(error.fatal).toBe(true);
		});
	});

	describe('required keys', () => {
		it('should fail with MissingRequiredKey when the topology is missing', () => {
			const error = resolveError([{ name: 'defaults', values: {} }]);

			expect(error.code).toBe('MissingRequiredKey');
			expect(error.keys).toEqual(['TOPOLOGY']);
		});

		it('should name every missing key a service needs', () => {
			const error = resolveError([
				{
					name: 'defaults',
					values: {
						TOPOLOGY: [
							{
								name: 'api',
								image: 'api:1',
								requiredConfig: ['X'],
								environment: { TOKEN: '${SECRET}' },
							},
						],
					},
				},
			]);

			expect(error.code).toBe('MissingRequiredKey');
			expect(error.keys).toEqual(['SECRET', 'X']);
			expect(error.message).toBe('Missing required configuration key(s): SECRET, X');
		});

		it('should treat an empty string as missing', () => {
			const error = resolveError([
				{ name: 'defaults', values: { X: 'set', TOPOLOGY: [{ name: 'api', image: 'api:1', requiredConfig: ['X'] }] } },
				{ name: 'environment', values: { X: '' } },
			]);

			expect(error.keys).toEqual(['X']);
		});

		it('should require the urlKey of an external dependency', () => {
			const error = resolveError([
				{
					name: 'defaults',
					values: {
						TOPOLOGY: [],
						EXTERNAL_DEPENDENCIES: [{ name: 'marketplace', urlKey: 'MARKETPLACE_API_URL' }],
					},
				},
			]);

			expect(error.keys).toEqual(['MARKETPLACE_API_URL']);
		});
	});

	describe('structured values', () => {
		it('should parse a topology supplied as JSON text', () => {
			const snapshot = resolver.resolve([
				{ name: 'defaults', values: { TOPOLOGY: '[]' } },
				{ name: 'environment', values: { TOPOLOGY: JSON.stringify([{ name: 'db', image: 'postgres:15' }]) } },
			]);

			expect(snapshot.topology.names()).toEqual(['db']);
			expect(snapshot.topology.get('db')?.image).toBe('postgres:15');
		});

		it('should reject malformed JSON with InvalidValue', () => {
			const error = resolveError([{ name: 'defaults', values: { TOPOLOGY: '[{' } }]);

			expect(error.code).toBe('InvalidValue');
			expect(error.message).toBe('TOPOLOGY is not valid JSON');
		});

		it('should reject a service without an image', () => {
			const error = resolveError([{ name: 'defaults', values: { TOPOLOGY: [{ name: 'db' }] } }]);

			expect(error.code).toBe('InvalidValue');
			expect(error.keys).toEqual(['TOPOLOGY']);
		});

		it('should coerce settings given as strings', () => {
			const snapshot = resolver.resolve([
				{ name: 'defaults', values: { TOPOLOGY: [], HEALTH_TIMEOUT_MS: 60000 } },
				{ name: 'environment', values: { HEALTH_TIMEOUT_MS: '1500', PRUNE_ORPHAN_VOLUMES: 'yes' } },
			]);

			expect(snapshot.settings.healthTimeoutMs).toBe(1500);
			expect(snapshot.settings.pruneOrphanVolumes).toBe(true);
			expect(snapshot.settings.projectName).toBe('stack');
			expect(snapshot.settings.concurrency).toBe(4);
		});

		it('should reject a non-numeric setting', () => {
			const error = resolveError([{ name: 'defaults', values: { TOPOLOGY: [], POLL_INTERVAL_MS: 'soon' } }]);

			expect(error.code).toBe('InvalidValue');
			expect(error.keys).toEqual(['settings']);
		});
	});

	describe('topology', () => {
		it('should reject dangling dependency references', () => {
			const error = resolveError([
				{ name: 'defaults', values: { TOPOLOGY: [{ name: 'api', image: 'api:1', dependsOn: ['db'] }] } },
			]);

			expect(error.code).toBe('InvalidTopology');
			expect(error.message).toBe('Unknown dependency reference(s): api -> db');
		});

		it('should interpolate configuration keys into service environments', () => {
			const snapshot = resolver.resolve([
				{
					name: 'defaults',
					values: {
						TOPOLOGY: [{ name: 'api', image: 'api:1', environment: { DSN: 'postgres://app:${DB_PASSWORD}@db/app' } }],
					},
				},
				{ name: 'user-override', values: { DB_PASSWORD: 'test-secret' } },
			]);

			expect(snapshot.topology.get('api')?.environment).toEqual({ DSN: 'postgres://app:test-secret@db/app' });
		});

		it('should build health check descriptors', () => {
			const snapshot = resolver.resolve([
				{
					name: 'defaults',
					values: {
						MARKETPLACE_API_URL: 'https://marketplace.example.com/',
						TOPOLOGY: [{ name: 'db', image: 'postgres:15', healthCheck: { kind: 'local', port: 5432 } }],
						EXTERNAL_DEPENDENCIES: [
							{ name: 'marketplace', urlKey: 'MARKETPLACE_API_URL', path: '/api/v1/plugins' },
						],
					},
				},
			]);

			expect(snapshot.topology.get('db')?.healthCheck).toEqual({ kind: 'local', target: 'db', port: 5432 });
			expect(snapshot.externalDependencies).toEqual([
				{ kind: 'remote', target: 'marketplace', url: 'https://marketplace.example.com/api/v1/plugins' },
			]);
		});

		it('should pass the readiness path of a local check through', () => {
			const snapshot = resolver.resolve([
				{
					name: 'defaults',
					values: {
						TOPOLOGY: [
							{
								name: 'api',
								image: 'api:1',
								healthCheck: { kind: 'local', port: 5001, path: '/console/api/ping', expectedStatus: [200] },
							},
						],
					},
				},
			]);

			expect(snapshot.topology.get('api')?.healthCheck).toEqual({
				kind: 'local',
				target: 'api',
				port: 5001,
				path: '/console/api/ping',
				expectedStatus: [200],
			});
		});

		it('should reject an external dependency named like a service', () => {
			const error = resolveError([
				{
					name: 'defaults',
					values: {
						TOPOLOGY: [{ name: 'db', image: 'postgres:15' }],
						EXTERNAL_DEPENDENCIES: [{ name: 'db', url: 'https://db.example.com/health' }],
					},
				},
			]);

			expect(error.code).toBe('InvalidTopology');
			expect(error.message).toBe('External dependency name(s) collide with services: db');
			expect(error.keys).toEqual(['EXTERNAL_DEPENDENCIES']);
		});
	});

	describe('snapshot', () => {
		it('should warn about values still coming from the example template', () => {
			const snapshot = resolver.resolve([
				{ name: 'defaults', values: { TOPOLOGY: [] } },
				{ name: 'example-template', values: { SECRET_KEY: 'change-me', DB_PASSWORD: 'change-me' } },
				{ name: 'environment', values: { DB_PASSWORD: 'test-secret' } },
			]);

			expect(snapshot.issues).toEqual([
				{
					code: 'TemplateValueInUse',
					key: 'SECRET_KEY',
					message: 'SECRET_KEY still carries the value from the example template',
				},
			]);
		});

		it('should be deeply frozen', () => {
			const snapshot = resolver.resolve([
				{ name: 'defaults', values: { TOPOLOGY: [{ name: 'db', image: 'postgres:15', ports: ['5432:5432'] }] } },
			]);

			expect(Object.isFrozen(snapshot)).toBe(true);
			expect(Object.isFrozen(snapshot.values)).toBe(true);
			expect(Object.isFrozen(snapshot.settings)).toBe(true);
			expect(Object.isFrozen(snapshot.topology.get('db')?.ports)).toBe(true);
		});

		it('should leave the input layers untouched', () => {
			const topology = [{ name: 'db', image: 'postgres:15' }];
			resolver.resolve([{ name: 'defaults', values: { TOPOLOGY: topology } }]);

			expect(Object.isFrozen(topology)).toBe(false);
		});
	});
});
