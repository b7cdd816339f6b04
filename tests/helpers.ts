import path from 'node:path';
import { vi } from 'vitest';
import type { LLMMessage, LLMProvider, LLMResponse, LLMTool, ChatOptions } from '../src/chat/llmProvider.js';
import type { ConversionResult, ExtractConverter } from '../src/convert/hyperConverter.js';
import type { DatasetCheckResult, DatasetGateway, DatasetInfo, TableauSession } from '../src/tableau/types.js';

export const TEST_SESSION: TableauSession = { token: 'test-auth-token', siteId: 'site-1' };

/** In-memory Tableau stand-in: projects map to their datasets. */
export function createFakeGateway(projects: Record<string, DatasetInfo[]> = {}) {
  const projectId = (session: TableauSession, name: string): string => {
    if (!(name in projects)) {
      throw new Error(`Project '${name}' not found on Tableau Server`);
    }
    return `project-${name}`;
  };

  const gateway = {
    connect: vi.fn(async (): Promise<TableauSession> => TEST_SESSION),
    release: vi.fn(async (_session: TableauSession): Promise<void> => undefined),
    resolveProjectId: vi.fn(async (session: TableauSession, name: string) => projectId(session, name)),
    upload: vi.fn(async (session: TableauSession, filePath: string, projectName: string): Promise<DatasetInfo> => ({
      name: path.parse(filePath).name,
      id: 'ds-1',
      project_id: projectId(session, projectName),
      file_path: filePath,
    })),
    list: vi.fn(async (session: TableauSession, projectName: string): Promise<DatasetInfo[]> => {
      projectId(session, projectName);
      return projects[projectName] ?? [];
    }),
    check: vi.fn(async (session: TableauSession, name: string, projectName: string): Promise<DatasetCheckResult> => {
      projectId(session, projectName);
      const found = (projects[projectName] ?? []).find((ds) => ds.name === name);
      return found
        ? { exists: true, name: found.name, id: found.id, project_id: found.project_id }
        : { exists: false, name, project: projectName };
    }),
  } satisfies DatasetGateway;

  return gateway;
}

export function createFakeConverter() {
  const converter = {
    convert: vi.fn(
      async (sourcePath: string, outputPath?: string): Promise<ConversionResult> => ({
        input_file: sourcePath,
        output_file: outputPath ?? path.join(path.dirname(sourcePath), `${path.parse(sourcePath).name}.hyper`),
        rows: 3,
        columns: 2,
        column_names: ['region', 'amount'],
      }),
    ),
  } satisfies ExtractConverter;
  return converter;
}

/** LLM that replays scripted responses and records every conversation it was sent. */
export class ScriptedLLM implements LLMProvider {
  name = 'scripted';
  model = 'test-model';
  readonly calls: Array<{ messages: LLMMessage[]; tools: LLMTool[]; options?: ChatOptions }> = [];
  private readonly next: (call: number) => LLMResponse;

  constructor(responses: LLMResponse[] | ((call: number) => LLMResponse)) {
    this.next = Array.isArray(responses)
      ? (call) => {
          const response = responses[call];
          if (!response) throw new Error(`No scripted response for call ${call}`);
          return response;
        }
      : responses;
  }

  async chat(messages: LLMMessage[], tools: LLMTool[], options?: ChatOptions): Promise<LLMResponse> {
    this.calls.push({ messages: structuredClone(messages), tools, options });
    return this.next(this.calls.length - 1);
  }

  async listModels(): Promise<string[]> {
    return ['test-model', 'llama3.1:8b'];
  }
}
