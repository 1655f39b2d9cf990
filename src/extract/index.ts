export { TEST_MACROS, extractNameLines, extractTestNames, namesToTests } from './extractor.js';
export type { ExtractedTest } from './types.js';
