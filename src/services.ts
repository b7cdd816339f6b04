import type { Config } from './config/index.js';
import { OllamaProvider } from './chat/ollamaClient.js';
import type { LLMProvider } from './chat/llmProvider.js';
import { pgHyperConnector } from './convert/hyperConnection.js';
import { HyperConverter } from './convert/hyperConverter.js';
import { FileResolver } from './files/resolver.js';
import { TableauDatasetGateway } from './tableau/datasets.js';
import { TableauRestClient } from './tableau/restClient.js';
import { ToolExecutor } from './tools/executor.js';

export interface Services {
  llmProvider: LLMProvider;
  executor: ToolExecutor;
}

/** Wires the production collaborators from config. */
export function createServices(config: Config): Services {
  const gateway = new TableauDatasetGateway(new TableauRestClient(config.tableau));
  const executor = new ToolExecutor({
    gateway,
    converter: new HyperConverter(pgHyperConnector(config.hyperEndpoint)),
    resolver: new FileResolver(config.defaultFileDirectory),
    defaultProject: config.defaultProject,
  });
  const llmProvider = new OllamaProvider({ baseUrl: config.ollamaBaseUrl, model: config.ollamaModel });
  return { llmProvider, executor };
}
