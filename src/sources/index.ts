/**
 * Knowledge sources: two documentation tool servers and one web search.
 */

export * from './types.js';
export * from './errors.js';
export { SseLineScanner, parseDataLine, readSsePayloads } from './sse.js';
export { ToolProtocolClient, type ToolCache, type ToolDescriptor, type ToolTransport } from './tool-protocol.js';
export { normalizeToolContent, getToolContent, type ContentDefaults } from './tool-content.js';
export { KeywordSearch } from './keyword-search.js';
export { AwsDocsClient, AWS_DOCS_LABEL, extractAwsDocUrl } from './aws-docs.js';
export { MicrosoftLearnClient, MICROSOFT_LEARN_LABEL } from './microsoft-learn.js';
export {
  categorizeQuery,
  selectDomains,
  vendorDomains,
  needsAiEnhancement,
  templateEnhancement,
  resolveStartDate,
  loadSearchDomainTable,
  SEARCH_CATEGORIES,
  type SearchCategory,
  type SearchDomainTable,
} from './domain-selector.js';
export { ExaSearchClient, EXA_SEARCH_LABEL, type ExaSearchRequest } from './web-search.js';
