/**
 * Tablepaste Engine - HTML Module Exports
 */

export {
  cellText,
  tableGrid,
  isolateTableMarkup,
  extractHtmlTable,
} from './HtmlTableExtractor.js';

export type { ElementNode } from './HtmlTableExtractor.js';
