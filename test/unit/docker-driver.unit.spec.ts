/**
 * Unit Tests for DockerDriver
 * Tests the real driver against a mocked dockerode client.
 *
 * What we test: project filtering of listed objects, idempotent lifecycle
 * calls, image pulls and the container create options
 * What we mock: dockerode
 */

import { LABELS } from '../../src/config/topology';
import { DockerDriver } from '../../src/orchestrator/docker-driver';
import { ReconciliationPlanner } from '../../src/orchestrator/reconciliation-planner';
import { RuntimeInventory } from '../../src/orchestrator/runtime-inventory';
import { serviceSpec, topologyOf } from '../fixtures/topology';

const asyncMock = () => jest.fn<Promise<unknown>, unknown[]>();

function createMockDocker() {
	const container = { start: asyncMock(), stop: asyncMock(), remove: asyncMock(), inspect: asyncMock() };
	const image = { inspect: asyncMock() };
	const network = { remove: asyncMock() };
	const volume = { remove: asyncMock() };

	return {
		container,
		image,
		network,
		volume,
		ping: asyncMock(),
		listContainers: asyncMock(),
		listNetworks: asyncMock(),
		listVolumes: asyncMock(),
		createContainer: asyncMock(),
		createNetwork: asyncMock(),
		createVolume: asyncMock(),
		pull: asyncMock(),
		getContainer: jest.fn(() => container),
		getImage: jest.fn(() => image),
		getNetwork: jest.fn(() => network),
		getVolume: jest.fn(() => volume),
		modem: {
			followProgress: jest.fn((_stream: unknown, onFinished: (err: Error | null) => void) => onFinished(null)),
		},
	};
}

let mockDocker = createMockDocker();

jest.mock('dockerode', () =>
	function MockDocker() {
		return mockDocker;
	},
);

const dockerError = (statusCode: number, message: string) => Object.assign(new Error(message), { statusCode });

describe('DockerDriver', () => {
	let driver: DockerDriver;

	beforeEach(() => {
		mockDocker = createMockDocker();
		driver = new DockerDriver({ socketPath: '/tmp/test.sock' });
	});

	describe('listObjects()', () => {
		it('should return the project containers, networks and volumes only', async () => {
			const db = {
				Id: 'a1',
				Names: ['/stack-db'],
				Labels: { [LABELS.project]: 'stack', [LABELS.service]: 'db' },
				State: 'running',
				Image: 'postgres:15',
			};
			mockDocker.listContainers.mockResolvedValueOnce([db]).mockResolvedValueOnce([
				db,
				{ Id: 'b2', Names: ['/stack-legacy'], Labels: {}, State: 'exited', Image: 'busybox:latest' },
				{ Id: 'c3', Names: ['/mystack-web'], Labels: {}, State: 'running', Image: 'web:1' },
			]);
			mockDocker.listNetworks.mockResolvedValue([
				{ Id: 'n1', Name: 'stack_default', Labels: { [LABELS.project]: 'stack' } },
				{ Id: 'n2', Name: 'bridge', Labels: {} },
			]);
			mockDocker.listVolumes.mockResolvedValue({
				Volumes: [
					{ Name: 'stack_db-data', Labels: null },
					{ Name: 'unrelated', Labels: {} },
				],
			});

			const objects = await driver.listObjects('stack');

			expect(objects).toEqual([
				{ kind: 'container', id: 'a1', name: 'stack-db', labels: db.Labels, state: 'running', image: 'postgres:15' },
				{ kind: 'container', id: 'b2', name: 'stack-legacy', labels: {}, state: 'stopped', image: 'busybox:latest' },
				{ kind: 'network', id: 'n1', name: 'stack_default', labels: { [LABELS.project]: 'stack' } },
				{ kind: 'volume', id: 'stack_db-data', name: 'stack_db-data', labels: {} },
			]);
			expect(mockDocker.listContainers).toHaveBeenCalledWith({
				all: true,
				filters: { label: [`${LABELS.project}=stack`] },
			});
		});

		it('should leave objects labelled for another project alone', async () => {
			mockDocker.ping.mockResolvedValue('OK');
			mockDocker.listContainers.mockResolvedValueOnce([]).mockResolvedValueOnce([
				{
					Id: 'd4',
					Names: ['/stack-dev-api'],
					Labels: { [LABELS.project]: 'stack-dev', [LABELS.service]: 'api' },
					State: 'running',
					Image: 'api:1',
				},
			]);
			mockDocker.listNetworks.mockResolvedValue([
				{ Id: 'n3', Name: 'stack_x_default', Labels: { [LABELS.project]: 'stack_x' } },
			]);
			mockDocker.listVolumes.mockResolvedValue({
				Volumes: [{ Name: 'stack_x_data', Labels: { [LABELS.project]: 'stack_x' } }],
			});

			const topology = topologyOf(serviceSpec('api'));
			const records = await new RuntimeInventory(driver, 'stack').refresh(topology);
			const actions = new ReconciliationPlanner({ projectName: 'stack', pruneOrphanVolumes: true }).plan(topology, records);

			expect(records.map((record) => [record.kind, record.name, record.state])).toEqual([
				['container', 'stack-api', 'absent'],
				['network', 'stack_default', 'absent'],
			]);
			expect(actions.filter((action) => action.kind === 'stop' || action.kind === 'remove')).toEqual([]);
		});
	});

	describe('createContainer()', () => {
		const spec = {
			name: 'stack-db',
			image: 'postgres:15',
			labels: { [LABELS.project]: 'stack' },
			environment: { POSTGRES_DB: 'app' },
			ports: ['5432:5432'],
			volumes: ['stack_db-data:/var/lib/postgresql/data'],
			network: 'stack_default',
			aliases: ['db'],
		};

		it('should pull a missing image before creating the container', async () => {
			mockDocker.image.inspect.mockRejectedValue(dockerError(404, 'No such image: postgres:15'));
			mockDocker.pull.mockResolvedValue('progress-stream');
			mockDocker.createContainer.mockResolvedValue({ id: '0123456789abcdef0123' });

			const id = await driver.createContainer(spec);

			expect(id).toBe('0123456789abcdef0123');
			expect(mockDocker.pull).toHaveBeenCalledWith('postgres:15');
			expect(mockDocker.modem.followProgress).toHaveBeenCalledTimes(1);
			expect(mockDocker.createContainer).toHaveBeenCalledWith({
				name: 'stack-db',
				Image: 'postgres:15',
				Env: ['POSTGRES_DB=app'],
				Labels: { [LABELS.project]: 'stack' },
				ExposedPorts: { '5432/tcp': {} },
				HostConfig: {
					PortBindings: { '5432/tcp': [{ HostPort: '5432' }] },
					Binds: ['stack_db-data:/var/lib/postgresql/data'],
					NetworkMode: 'stack_default',
					RestartPolicy: { Name: 'unless-stopped', MaximumRetryCount: 0 },
				},
				NetworkingConfig: { EndpointsConfig: { stack_default: { Aliases: ['db'] } } },
			});
		});

		it('should not pull an image that is already present', async () => {
			mockDocker.image.inspect.mockResolvedValue({ Id: 'sha256:abc' });
			mockDocker.createContainer.mockResolvedValue({ id: 'fedcba9876543210' });

			await driver.createContainer(spec);

			expect(mockDocker.pull).not.toHaveBeenCalled();
		});

		it('should fail when the image pull fails', async () => {
			mockDocker.image.inspect.mockRejectedValue(dockerError(404, 'No such image: postgres:15'));
			mockDocker.pull.mockRejectedValue(new Error('pull access denied for postgres'));

			await expect(driver.createContainer(spec)).rejects.toThrow('pull access denied for postgres');
			expect(mockDocker.createContainer).not.toHaveBeenCalled();
		});
	});

	describe('idempotent lifecycle', () => {
		it('should treat starting a running container as done', async () => {
			mockDocker.container.start.mockRejectedValue(dockerError(304, 'container already started'));

			await expect(driver.startContainer('stack-db')).resolves.toBeUndefined();
		});

		it('should propagate other start errors', async () => {
			mockDocker.container.start.mockRejectedValue(dockerError(500, 'port is already allocated'));

			await expect(driver.startContainer('stack-db')).rejects.toThrow('port is already allocated');
		});

		it('should treat stopping a missing container as done', async () => {
			mockDocker.container.stop.mockRejectedValue(dockerError(404, 'No such container: stack-db'));

			await expect(driver.stopContainer('stack-db')).resolves.toBeUndefined();
			expect(mockDocker.container.stop).toHaveBeenCalledWith({ t: 10 });
		});

		it('should force-remove containers', async () => {
			mockDocker.container.remove.mockResolvedValue(undefined);

			await driver.removeObject('container', 'a1');

			expect(mockDocker.getContainer).toHaveBeenCalledWith('a1');
			expect(mockDocker.container.remove).toHaveBeenCalledWith({ force: true });
		});

		it('should treat removing a missing network as done', async () => {
			mockDocker.network.remove.mockRejectedValue(dockerError(404, 'network stack_old not found'));

			await expect(driver.removeObject('network', 'stack_old')).resolves.toBeUndefined();
		});
	});

	describe('resolveAddress()', () => {
		it('should return the address on the requested network', async () => {
			mockDocker.container.inspect.mockResolvedValue({
				NetworkSettings: { Networks: { bridge: { IPAddress: '172.17.0.2' }, stack_default: { IPAddress: '172.18.0.5' } } },
			});

			expect(await driver.resolveAddress('stack-db', 'stack_default')).toBe('172.18.0.5');
		});

		it('should return undefined when the container has no address', async () => {
			mockDocker.container.inspect.mockResolvedValue({ NetworkSettings: { Networks: { stack_default: { IPAddress: '' } } } });

			expect(await driver.resolveAddress('stack-db', 'stack_default')).toBeUndefined();
		});
	});
});
