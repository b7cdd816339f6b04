import path from 'node:path';
import { ResourceNotFoundError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { TableauRestClient } from './restClient.js';
import type { DatasetCheckResult, DatasetGateway, DatasetInfo, TableauSession } from './types.js';

const log = createLogger('Tableau');

export class TableauDatasetGateway implements DatasetGateway {
  constructor(private readonly client: TableauRestClient) {}

  connect(): Promise<TableauSession> {
    return this.client.signIn();
  }

  release(session: TableauSession): Promise<void> {
    return this.client.signOut(session);
  }

  async resolveProjectId(session: TableauSession, projectName: string): Promise<string> {
    const projects = await this.client.listProjects(session);
    const project = projects.find((p) => p.name === projectName);
    if (!project) {
      throw new ResourceNotFoundError(`Project '${projectName}' not found on Tableau Server`);
    }
    return project.id;
  }

  async upload(session: TableauSession, filePath: string, projectName: string): Promise<DatasetInfo> {
    const projectId = await this.resolveProjectId(session, projectName);
    const name = path.basename(filePath, path.extname(filePath));
    const published = await this.client.publishDatasource(session, filePath, projectId, name);
    log.info({ name: published.name, id: published.id, projectId }, 'Dataset published');
    return { name: published.name, id: published.id, project_id: published.projectId, file_path: filePath };
  }

  async check(session: TableauSession, datasetName: string, projectName: string): Promise<DatasetCheckResult> {
    const datasets = await this.list(session, projectName);
    const found = datasets.find((ds) => ds.name === datasetName);
    if (!found) {
      return { exists: false, name: datasetName, project: projectName };
    }
    return { exists: true, name: found.name, id: found.id, project_id: found.project_id };
  }

  async list(session: TableauSession, projectName: string): Promise<DatasetInfo[]> {
    const projectId = await this.resolveProjectId(session, projectName);
    const datasources = await this.client.listDatasources(session);
    return datasources
      .filter((ds) => ds.projectId === projectId)
      .map((ds) => ({ name: ds.name, id: ds.id, project_id: ds.projectId }));
  }
}

/**
 * Signs in, runs `fn`, and always signs out. A failed sign-out is logged and
 * never replaces the operation's own result or error.
 */
export async function withTableauSession<T>(
  gateway: DatasetGateway,
  fn: (session: TableauSession) => Promise<T>,
): Promise<T> {
  const session = await gateway.connect();
  try {
    return await fn(session);
  } finally {
    try {
      await gateway.release(session);
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Tableau sign-out failed');
    }
  }
}
