/**
 * Tablepaste Engine - Parser Module Exports
 */

export {
  TableReconstructor,
  createTableReconstructor,
  parseClipboardText,
  parseClipboardHtml,
} from './TableReconstructor.js';

export type {
  TableReconstructorEvents,
  ParseOptions,
  HtmlParseOptions,
} from './TableReconstructor.js';
