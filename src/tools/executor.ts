import path from 'node:path';
import { trace, SpanStatusCode } from '@opentelemetry/api';
import { toolRegistry } from '../chat/tools.js';
import type { ToolName, ToolRegistry } from '../chat/tools.js';
import type { ExtractConverter } from '../convert/hyperConverter.js';
import { ToolValidationError, errorMessage } from '../errors.js';
import { DATASET_EXTENSIONS, EXCEL_EXTENSIONS } from '../files/resolver.js';
import type { FileResolver } from '../files/resolver.js';
import { createLogger } from '../logger.js';
import { withTableauSession } from '../tableau/datasets.js';
import type { DatasetGateway } from '../tableau/types.js';
import { failure, success } from './result.js';
import type { ToolResult } from './result.js';

const log = createLogger('Executor');
const tracer = trace.getTracer('tool-executor');

type ToolArgs = Record<string, unknown>;
type ToolHandler = (args: ToolArgs) => Promise<Record<string, unknown>>;

const EXCEL_FORMATS: readonly string[] = EXCEL_EXTENSIONS;

export interface ToolExecutorDeps {
  gateway: DatasetGateway;
  converter: ExtractConverter;
  resolver: FileResolver;
  defaultProject: string;
  registry?: ToolRegistry;
}

/** Reads a parameter the executor has already validated as a non-empty string. */
function requiredString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value === '') {
    throw new ToolValidationError(`Missing required parameter: ${key}`);
  }
  return value;
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Runs tool calls requested by the model. `execute` never rejects: every
 * failure comes back as an error `ToolResult` the model can read.
 */
export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly handlers: Record<ToolName, ToolHandler>;

  constructor(private readonly deps: ToolExecutorDeps) {
    this.registry = deps.registry ?? toolRegistry;
    this.handlers = {
      upload_dataset: (args) => this.uploadDataset(args),
      check_dataset: (args) => this.checkDataset(args),
      list_datasets: (args) => this.listDatasets(args),
      convert_excel_to_hyper: (args) => this.convertExcelToHyper(args),
    };
  }

  async execute(name: string, args: ToolArgs): Promise<ToolResult> {
    if (!this.registry.has(name)) {
      log.warn({ action: 'tool.unknown', tool: name }, 'Unknown tool requested');
      return failure(name, `Unknown tool: ${name}`);
    }

    const span = tracer.startSpan(`tool.${name}`);
    span.setAttribute('tool.name', name);
    log.info({ action: 'tool.started', tool: name, args }, 'Tool call started');

    try {
      this.validate(name, args);
      const result = await this.handlers[name](args);
      span.setAttribute('tool.status', 'success');
      span.setStatus({ code: SpanStatusCode.OK });
      log.info({ action: 'tool.succeeded', tool: name }, 'Tool call succeeded');
      return success(name, result);
    } catch (error) {
      const message = errorMessage(error);
      span.setAttribute('tool.status', 'error');
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      log.warn({ action: 'tool.failed', tool: name, error: message }, 'Tool call failed');
      return failure(name, message);
    } finally {
      span.end();
    }
  }

  private validate(name: ToolName, args: ToolArgs): void {
    const definition = this.registry.get(name);
    if (!definition) {
      throw new ToolValidationError(`Unknown tool: ${name}`);
    }

    for (const field of definition.parameters.required) {
      const value = args[field];
      if (value === undefined || value === null || value === '') {
        throw new ToolValidationError(`Missing required parameter: ${field}`);
      }
    }

    for (const [field, parameter] of Object.entries(definition.parameters.properties)) {
      const value = args[field];
      if (value === undefined || value === null) continue;
      if (parameter.type === 'string' && typeof value !== 'string') {
        throw new ToolValidationError(`Invalid parameter: ${field} must be a string`);
      }
    }
  }

  private async uploadDataset(args: ToolArgs): Promise<Record<string, unknown>> {
    const { gateway, converter, resolver } = this.deps;
    const project = requiredString(args, 'tableau_project');
    const sourcePath = await resolver.resolve(requiredString(args, 'file_path'), DATASET_EXTENSIONS);
    const extension = path.extname(sourcePath).toLowerCase();

    let uploadPath = sourcePath;
    let conversion: Record<string, unknown> | undefined;

    if (EXCEL_FORMATS.includes(extension) || extension === '.csv') {
      const converted = await converter.convert(sourcePath);
      uploadPath = converted.output_file;
      conversion = {
        converted_from: extension === '.csv' ? 'CSV' : 'Excel',
        original_file: sourcePath,
        rows: converted.rows,
        columns: converted.columns,
      };
    } else if (extension !== '.hyper') {
      throw new ToolValidationError(
        `Unsupported file format: ${extension}. Supported formats: .hyper, .xlsx, .xls, .xlsm, .xlsb, .csv`,
      );
    }

    const info = await withTableauSession(gateway, (session) => gateway.upload(session, uploadPath, project));
    return { ...info, ...conversion };
  }

  private async checkDataset(args: ToolArgs): Promise<Record<string, unknown>> {
    const { gateway } = this.deps;
    const name = requiredString(args, 'dataset_name');
    const project = optionalString(args, 'tableau_project') ?? this.deps.defaultProject;
    return withTableauSession(gateway, (session) => gateway.check(session, name, project));
  }

  private async listDatasets(args: ToolArgs): Promise<Record<string, unknown>> {
    const { gateway } = this.deps;
    const project = optionalString(args, 'tableau_project') ?? this.deps.defaultProject;
    const datasets = await withTableauSession(gateway, (session) => gateway.list(session, project));
    return {
      project,
      count: datasets.length,
      datasets: datasets.map((ds) => ({ name: ds.name, id: ds.id, project_id: ds.project_id })),
    };
  }

  private async convertExcelToHyper(args: ToolArgs): Promise<Record<string, unknown>> {
    const { converter, resolver } = this.deps;
    const sourcePath = await resolver.resolve(requiredString(args, 'excel_file_path'), EXCEL_EXTENSIONS);
    const output = optionalString(args, 'hyper_file_path');
    const result = await converter.convert(sourcePath, output === undefined ? undefined : resolver.toAbsolute(output));
    return { ...result };
  }
}
