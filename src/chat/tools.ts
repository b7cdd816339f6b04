import type { LLMTool } from './llmProvider.js';

export type ParameterType = 'string' | 'number' | 'boolean';

export interface ToolParameter {
  type: ParameterType;
  description: string;
}

export interface ToolDefinition<N extends string = string> {
  name: N;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, ToolParameter>;
    required: string[];
  };
}

export const TOOL_NAMES = [
  'upload_dataset',
  'check_dataset',
  'list_datasets',
  'convert_excel_to_hyper',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

const TOOL_DEFINITIONS: ToolDefinition<ToolName>[] = [
  {
    name: 'upload_dataset',
    description:
      'Upload a dataset file to Tableau Server, overwriting a dataset of the same name. ' +
      'Accepts Excel (.xlsx, .xls, .xlsm, .xlsb), CSV (.csv) or Hyper (.hyper) files; Excel and CSV files are ' +
      'converted to Hyper format before upload. Use ONLY the filename, not a full path ' +
      "(e.g. 'sales.xlsx', 'data.csv' or 'revenue'). " +
      'The Tableau project is REQUIRED: if the user has not named one, ask them for it before calling this tool.',
    parameters: {
      type: 'object',
      properties: {
        file_path: {
          type: 'string',
          description:
            "FILENAME ONLY (not full path). Examples: 'data.csv', 'sales.xlsx', 'revenue'. " +
            'Files are searched in the configured default directory; the extension is optional.',
        },
        tableau_project: {
          type: 'string',
          description: 'Name of the Tableau project to upload into. Must be given explicitly by the user.',
        },
      },
      required: ['file_path', 'tableau_project'],
    },
  },
  {
    name: 'check_dataset',
    description:
      'Check if a dataset exists in Tableau Server. Searches for the dataset by name within a project ' +
      'and returns whether it exists and its details if found.',
    parameters: {
      type: 'object',
      properties: {
        dataset_name: {
          type: 'string',
          description: 'Name of the dataset to check',
        },
        tableau_project: {
          type: 'string',
          description: 'Tableau project name to search in. Optional - defaults to the configured project.',
        },
      },
      required: ['dataset_name'],
    },
  },
  {
    name: 'list_datasets',
    description: 'List all datasets in a Tableau project. Returns name and ID for each dataset found in the project.',
    parameters: {
      type: 'object',
      properties: {
        tableau_project: {
          type: 'string',
          description: 'Tableau project name to list datasets from. Optional - defaults to the configured project.',
        },
      },
      required: [],
    },
  },
  {
    name: 'convert_excel_to_hyper',
    description: 'Convert an Excel file (.xlsx, .xls, .xlsm, .xlsb) to Tableau Hyper format (.hyper) without uploading it.',
    parameters: {
      type: 'object',
      properties: {
        excel_file_path: {
          type: 'string',
          description: 'Excel filename to convert; the extension is optional.',
        },
        hyper_file_path: {
          type: 'string',
          description: 'Output path for the Hyper file (optional, defaults to the same name with .hyper extension)',
        },
      },
      required: ['excel_file_path'],
    },
  },
];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Read-only catalog of the tools the assistant can call.
 * Built once at startup and shared by the chat loop, the MCP server and the executor.
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDefinition<ToolName>>;
  private readonly list: readonly ToolDefinition<ToolName>[];

  constructor(definitions: ToolDefinition<ToolName>[] = TOOL_DEFINITIONS) {
    const seen = new Set<string>();
    for (const def of definitions) {
      if (seen.has(def.name)) {
        throw new Error(`Duplicate tool definition: ${def.name}`);
      }
      for (const field of def.parameters.required) {
        if (!(field in def.parameters.properties)) {
          throw new Error(`Tool ${def.name} requires undeclared parameter: ${field}`);
        }
      }
      seen.add(def.name);
    }
    this.list = deepFreeze(structuredClone(definitions));
    this.tools = new Map(this.list.map((def) => [def.name, def]));
  }

  definitions(): readonly ToolDefinition<ToolName>[] {
    return this.list;
  }

  has(name: string): name is ToolName {
    return this.tools.has(name);
  }

  get(name: string): ToolDefinition<ToolName> | undefined {
    return this.tools.get(name);
  }

  toLLMTools(): LLMTool[] {
    return this.list.map((def) => ({
      name: def.name,
      description: def.description,
      parameters: {
        type: 'object',
        properties: { ...def.parameters.properties },
        required: [...def.parameters.required],
      },
    }));
  }
}

export const toolRegistry = new ToolRegistry();
