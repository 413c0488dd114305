/**
 * Tablepaste Engine - Error Types
 */

import type { ReconstructionKind } from '../types/index.js';

/**
 * A reconstruction strategy blew up or produced nothing usable.
 * The orchestrator recovers by falling back to plain padding; this error
 * only ever reaches callers through the `onStrategyError` event.
 */
export class StrategyError extends Error {
  readonly kind: ReconstructionKind;

  constructor(kind: ReconstructionKind, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Strategy "${kind}" failed: ${detail}`, { cause });
    this.name = 'StrategyError';
    this.kind = kind;
  }
}

export type HtmlTableErrorReason = 'no-table' | 'malformed';

/**
 * HTML clipboard content could not be flattened into rows.
 */
export class HtmlTableError extends Error {
  readonly reason: HtmlTableErrorReason;

  constructor(message: string, reason: HtmlTableErrorReason) {
    super(message);
    this.name = 'HtmlTableError';
    this.reason = reason;
  }
}
