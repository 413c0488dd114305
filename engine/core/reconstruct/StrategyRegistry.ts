/**
 * Tablepaste Engine - Strategy Registry
 */

import type { ReconstructionKind, StrategyResult, TokenizedTable } from '../types/index.js';
import type { ReconstructionConfig } from '../config/ReconstructionConfig.js';
import { mergeSplitRows } from './SplitRowMerger.js';
import { mergeSpanningHeader } from './SpanningHeaderMerger.js';
import { mergeMultilineHeader } from './MultilineHeaderMerger.js';
import { buildWikipediaHeader, cleanWikipediaRows } from './WikipediaHeaderBuilder.js';
import { padPlainRows } from './PlainPadder.js';

export type ReconstructionStrategy = (
  table: TokenizedTable,
  config: ReconstructionConfig
) => StrategyResult;

export const STRATEGIES: Readonly<Record<ReconstructionKind, ReconstructionStrategy>> = {
  splitRow: mergeSplitRows,
  spanningHeader: mergeSpanningHeader,
  multilineHeader: mergeMultilineHeader,
  wikipediaHeader: buildWikipediaHeader,
  wikipediaRows: cleanWikipediaRows,
  plain: padPlainRows,
};

export function getStrategy(kind: ReconstructionKind): ReconstructionStrategy {
  return STRATEGIES[kind];
}
