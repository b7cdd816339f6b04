import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TableauDatasetGateway, withTableauSession } from '../../src/tableau/datasets.js';
import { TableauRestClient } from '../../src/tableau/restClient.js';
import { ResourceNotFoundError } from '../../src/errors.js';
import { createFakeGateway, TEST_SESSION } from '../helpers.js';

function makeClient() {
  const client = new TableauRestClient(
    { serverUrl: 'https://tableau.test.local', siteId: '', patName: 'test-token', patSecret: 'test-secret', apiVersion: '3.19' },
    { fetchImpl: vi.fn(async () => new Response('unexpected request', { status: 500 })) },
  );
  vi.spyOn(client, 'listProjects').mockResolvedValue([
    { id: 'p-1', name: 'Default' },
    { id: 'p-2', name: 'Finance' },
  ]);
  vi.spyOn(client, 'listDatasources').mockResolvedValue([
    { id: 'ds-1', name: 'sales', projectId: 'p-1' },
    { id: 'ds-2', name: 'budget', projectId: 'p-2' },
    { id: 'ds-3', name: 'forecast', projectId: 'p-2' },
  ]);
  vi.spyOn(client, 'publishDatasource').mockResolvedValue({ id: 'ds-9', name: 'q3', projectId: 'p-2' });
  return client;
}

describe('TableauDatasetGateway', () => {
  let client: TableauRestClient;
  let gateway: TableauDatasetGateway;

  beforeEach(() => {
    client = makeClient();
    gateway = new TableauDatasetGateway(client);
  });

  it('should resolve a project id by exact name', async () => {
    await expect(gateway.resolveProjectId(TEST_SESSION, 'Finance')).resolves.toBe('p-2');
  });

  it('should raise ResourceNotFoundError for an unknown project', async () => {
    const error = await gateway.resolveProjectId(TEST_SESSION, 'finance').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResourceNotFoundError);
    expect(error).toMatchObject({ message: "Project 'finance' not found on Tableau Server" });
  });

  it('should list only datasets of the project', async () => {
    await expect(gateway.list(TEST_SESSION, 'Finance')).resolves.toEqual([
      { name: 'budget', id: 'ds-2', project_id: 'p-2' },
      { name: 'forecast', id: 'ds-3', project_id: 'p-2' },
    ]);
  });

  it('should report an existing dataset', async () => {
    await expect(gateway.check(TEST_SESSION, 'sales', 'Default')).resolves.toEqual({
      exists: true,
      name: 'sales',
      id: 'ds-1',
      project_id: 'p-1',
    });
  });

  it('should not find a dataset that lives in another project', async () => {
    await expect(gateway.check(TEST_SESSION, 'sales', 'Finance')).resolves.toEqual({
      exists: false,
      name: 'sales',
      project: 'Finance',
    });
  });

  it('should publish under the file stem', async () => {
    const result = await gateway.upload(TEST_SESSION, '/data/exports/q3.hyper', 'Finance');

    expect(client.publishDatasource).toHaveBeenCalledWith(TEST_SESSION, '/data/exports/q3.hyper', 'p-2', 'q3');
    expect(result).toEqual({ name: 'q3', id: 'ds-9', project_id: 'p-2', file_path: '/data/exports/q3.hyper' });
  });
});

describe('withTableauSession', () => {
  it('should sign out after the operation', async () => {
    const gateway = createFakeGateway();

    const result = await withTableauSession(gateway, async (session) => session.siteId);

    expect(result).toBe('site-1');
    expect(gateway.release).toHaveBeenCalledWith(TEST_SESSION);
  });

  it('should sign out and rethrow when the operation fails', async () => {
    const gateway = createFakeGateway();

    await expect(
      withTableauSession(gateway, async () => {
        throw new Error('publish failed');
      }),
    ).rejects.toThrow('publish failed');
    expect(gateway.release).toHaveBeenCalledTimes(1);
  });

  it('should not let a failed sign-out mask the result', async () => {
    const gateway = createFakeGateway();
    gateway.release.mockRejectedValueOnce(new Error('sign-out refused'));

    await expect(withTableauSession(gateway, async () => 'ok')).resolves.toBe('ok');
  });

  it('should not let a failed sign-out mask the original error', async () => {
    const gateway = createFakeGateway();
    gateway.release.mockRejectedValueOnce(new Error('sign-out refused'));

    await expect(
      withTableauSession(gateway, async () => {
        throw new Error('publish failed');
      }),
    ).rejects.toThrow('publish failed');
  });

  it('should not run the operation when sign-in fails', async () => {
    const gateway = createFakeGateway();
    gateway.connect.mockRejectedValueOnce(new Error('Tableau API error (401): Unauthorized'));
    const operation = vi.fn(async () => 'never');

    await expect(withTableauSession(gateway, operation)).rejects.toThrow('Unauthorized');
    expect(operation).not.toHaveBeenCalled();
    expect(gateway.release).not.toHaveBeenCalled();
  });
});
