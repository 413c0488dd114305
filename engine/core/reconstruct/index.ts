/**
 * Tablepaste Engine - Reconstruct Module Exports
 */

export { pendingRank, mergeSplitRows } from './SplitRowMerger.js';

export {
  subHeaderLabels,
  findSpanningColumn,
  buildSpanningHeader,
  startsRecord,
  reconstructRecords,
  mergeSpanningHeader,
} from './SpanningHeaderMerger.js';

export {
  findDataStart,
  stitchHeaderLines,
  mergeHeaderColumns,
  mergeMultilineHeader,
} from './MultilineHeaderMerger.js';

export {
  chooseHeaderRow,
  sanitizeHeaderCell,
  findWikipediaDataStart,
  buildWikipediaHeader,
  cleanWikipediaRows,
} from './WikipediaHeaderBuilder.js';

export { padPlainRows } from './PlainPadder.js';

export { STRATEGIES, getStrategy } from './StrategyRegistry.js';
export type { ReconstructionStrategy } from './StrategyRegistry.js';
