export { GoogleSearchClient, isTransientStatus, withTimeout } from './search-client.js';
export type { SearchClient, SearchOptions, GoogleSearchConfig } from './search-client.js';
export { SimulatedSearchClient } from './simulated-search.js';
export { overviewQuery, newsQuery, contactsQuery, parseQuery } from './search-queries.js';
export { AnthropicLanguageModel, classifyModelError } from './language-model.js';
export type {
  LanguageModel, CompletionOptions, MessageTransport, MessageRequest, AnthropicModelConfig,
} from './language-model.js';
export { TemplateLanguageModel } from './template-model.js';
