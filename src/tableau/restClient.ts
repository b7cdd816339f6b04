import { randomBytes } from 'node:crypto';
import { open, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { TableauConfig } from '../config/index.js';
import { TableauApiError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { TableauSession, TableauProject, TableauDatasource } from './types.js';

const log = createLogger('Tableau');

/** Files above this size go through a chunked file-upload session. */
export const SINGLE_REQUEST_LIMIT_BYTES = 64 * 1024 * 1024;
export const UPLOAD_CHUNK_BYTES = 64 * 1024 * 1024;
const PAGE_SIZE = 100;

const paginationSchema = z.object({
  pageNumber: z.coerce.number(),
  pageSize: z.coerce.number(),
  totalAvailable: z.coerce.number(),
});

const signInSchema = z.object({
  credentials: z.object({
    token: z.string(),
    site: z.object({ id: z.string() }),
    user: z.object({ id: z.string() }).optional(),
  }),
});

const projectSchema = z.object({ id: z.string(), name: z.string() });

const projectsSchema = z.object({
  pagination: paginationSchema,
  projects: z.object({ project: z.array(projectSchema).default([]) }).default({}),
});

const datasourceSchema = z.object({
  id: z.string(),
  name: z.string(),
  project: z.object({ id: z.string(), name: z.string().optional() }),
});

const datasourcesSchema = z.object({
  pagination: paginationSchema,
  datasources: z.object({ datasource: z.array(datasourceSchema).default([]) }).default({}),
});

const publishSchema = z.object({ datasource: datasourceSchema });

const fileUploadSchema = z.object({
  fileUpload: z.object({ uploadSessionId: z.string() }),
});

const errorSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    summary: z.string().optional(),
    detail: z.string().optional(),
  }),
});

interface MultipartPart {
  name: string;
  contentType: string;
  body: Buffer | string;
  filename?: string;
}

/** Tableau's publish endpoints take `multipart/mixed`, which FormData cannot produce. */
export function buildMultipart(boundary: string, parts: MultipartPart[]): Buffer {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    const disposition = part.filename
      ? `Content-Disposition: name="${part.name}"; filename="${part.filename}"`
      : `Content-Disposition: name="${part.name}"`;
    chunks.push(Buffer.from(`--${boundary}\r\n${disposition}\r\nContent-Type: ${part.contentType}\r\n\r\n`));
    chunks.push(typeof part.body === 'string' ? Buffer.from(part.body) : part.body);
    chunks.push(Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`));
  return Buffer.concat(chunks);
}

export interface TableauRestClientOptions {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  publishTimeoutMs?: number;
  singleRequestLimitBytes?: number;
  chunkBytes?: number;
}

/**
 * Minimal Tableau Server REST API client: PAT sign-in/out, project and
 * datasource listing, and overwrite-mode datasource publishing.
 */
export class TableauRestClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly publishTimeoutMs: number;
  private readonly singleRequestLimitBytes: number;
  private readonly chunkBytes: number;

  constructor(private readonly config: TableauConfig, options: TableauRestClientOptions = {}) {
    this.baseUrl = `${config.serverUrl}/api/${config.apiVersion}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.publishTimeoutMs = options.publishTimeoutMs ?? 10 * 60_000;
    this.singleRequestLimitBytes = options.singleRequestLimitBytes ?? SINGLE_REQUEST_LIMIT_BYTES;
    this.chunkBytes = options.chunkBytes ?? UPLOAD_CHUNK_BYTES;
  }

  async signIn(): Promise<TableauSession> {
    log.info({ server: this.config.serverUrl, site: this.config.siteId }, 'Signing in to Tableau Server');
    const response = await this.send('/auth/signin', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        credentials: {
          personalAccessTokenName: this.config.patName,
          personalAccessTokenSecret: this.config.patSecret,
          site: { contentUrl: this.config.siteId },
        },
      }),
    });
    const { credentials } = signInSchema.parse(await response.json());
    return { token: credentials.token, siteId: credentials.site.id, userId: credentials.user?.id };
  }

  async signOut(session: TableauSession): Promise<void> {
    await this.send('/auth/signout', { method: 'POST' }, session);
    log.info('Signed out of Tableau Server');
  }

  async listProjects(session: TableauSession): Promise<TableauProject[]> {
    const projects: TableauProject[] = [];
    for (let page = 1; ; page++) {
      const response = await this.send(
        `/sites/${session.siteId}/projects?pageSize=${PAGE_SIZE}&pageNumber=${page}`,
        { method: 'GET' },
        session,
      );
      const body = projectsSchema.parse(await response.json());
      projects.push(...body.projects.project);
      if (body.projects.project.length === 0 || page * body.pagination.pageSize >= body.pagination.totalAvailable) {
        return projects;
      }
    }
  }

  async listDatasources(session: TableauSession): Promise<TableauDatasource[]> {
    const datasources: TableauDatasource[] = [];
    for (let page = 1; ; page++) {
      const response = await this.send(
        `/sites/${session.siteId}/datasources?pageSize=${PAGE_SIZE}&pageNumber=${page}`,
        { method: 'GET' },
        session,
      );
      const body = datasourcesSchema.parse(await response.json());
      datasources.push(
        ...body.datasources.datasource.map((ds) => ({
          id: ds.id,
          name: ds.name,
          projectId: ds.project.id,
          projectName: ds.project.name,
        })),
      );
      if (
        body.datasources.datasource.length === 0 ||
        page * body.pagination.pageSize >= body.pagination.totalAvailable
      ) {
        return datasources;
      }
    }
  }

  /** Publishes a .hyper file, replacing any datasource of the same name in the project. */
  async publishDatasource(
    session: TableauSession,
    filePath: string,
    projectId: string,
    name: string,
  ): Promise<TableauDatasource> {
    const payload = JSON.stringify({ datasource: { name, project: { id: projectId } } });
    const { size } = await stat(filePath);
    const boundary = randomBytes(16).toString('hex');
    const datasourceType = path.extname(filePath).slice(1).toLowerCase() || 'hyper';

    let url = `/sites/${session.siteId}/datasources?overwrite=true&datasourceType=${datasourceType}`;
    let parts: MultipartPart[];

    if (size <= this.singleRequestLimitBytes) {
      parts = [
        { name: 'request_payload', contentType: 'application/json', body: payload },
        {
          name: 'tableau_datasource',
          filename: path.basename(filePath),
          contentType: 'application/octet-stream',
          body: await readFile(filePath),
        },
      ];
    } else {
      const uploadSessionId = await this.uploadInChunks(session, filePath, size);
      url += `&uploadSessionId=${uploadSessionId}`;
      parts = [{ name: 'request_payload', contentType: 'application/json', body: payload }];
    }

    log.info({ file: filePath, size, projectId }, 'Publishing datasource');
    const response = await this.send(
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': `multipart/mixed; boundary=${boundary}` },
        body: buildMultipart(boundary, parts),
      },
      session,
      this.publishTimeoutMs,
    );
    const { datasource } = publishSchema.parse(await response.json());
    return {
      id: datasource.id,
      name: datasource.name,
      projectId: datasource.project.id,
      projectName: datasource.project.name,
    };
  }

  private async uploadInChunks(session: TableauSession, filePath: string, size: number): Promise<string> {
    const initiated = await this.send(`/sites/${session.siteId}/fileUploads`, { method: 'POST' }, session);
    const { uploadSessionId } = fileUploadSchema.parse(await initiated.json()).fileUpload;

    const handle = await open(filePath, 'r');
    try {
      for (let offset = 0; offset < size; offset += this.chunkBytes) {
        const length = Math.min(this.chunkBytes, size - offset);
        const chunk = Buffer.alloc(length);
        await handle.read(chunk, 0, length, offset);
        const boundary = randomBytes(16).toString('hex');
        await this.send(
          `/sites/${session.siteId}/fileUploads/${uploadSessionId}`,
          {
            method: 'PUT',
            headers: { 'Content-Type': `multipart/mixed; boundary=${boundary}` },
            body: buildMultipart(boundary, [
              { name: 'request_payload', contentType: 'text/xml', body: '' },
              { name: 'tableau_file', filename: 'file', contentType: 'application/octet-stream', body: chunk },
            ]),
          },
          session,
          this.publishTimeoutMs,
        );
        log.debug({ uploadSessionId, offset, length }, 'Uploaded chunk');
      }
    } finally {
      await handle.close();
    }
    return uploadSessionId;
  }

  private async send(
    route: string,
    init: RequestInit,
    session?: TableauSession,
    timeoutMs: number = this.timeoutMs,
  ): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set('Accept', 'application/json');
    if (session) {
      headers.set('X-Tableau-Auth', session.token);
    }

    const response = await this.fetchImpl(`${this.baseUrl}${route}`, {
      ...init,
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw await toApiError(response);
    }
    return response;
  }
}

async function toApiError(response: Response): Promise<TableauApiError> {
  const text = await response.text();
  let parsed: z.infer<typeof errorSchema> | undefined;
  try {
    const result = errorSchema.safeParse(JSON.parse(text));
    parsed = result.success ? result.data : undefined;
  } catch {
    parsed = undefined;
  }

  if (!parsed) {
    return new TableauApiError(response.status, `Tableau API error (${response.status}): ${text || response.statusText}`);
  }

  const { code, summary, detail } = parsed.error;
  const description = [summary, detail].filter(Boolean).join(': ') || response.statusText;
  return new TableauApiError(
    response.status,
    `Tableau API error (${response.status}${code ? ` ${code}` : ''}): ${description}`,
    code,
  );
}
