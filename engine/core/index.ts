/**
 * Tablepaste Engine - Core Module Exports
 *
 * This is the main entry point for the Tablepaste reconstruction engine.
 */

// Orchestrator
export {
  TableReconstructor,
  createTableReconstructor,
  parseClipboardText,
  parseClipboardHtml,
} from './parser/index.js';
export type {
  TableReconstructorEvents,
  ParseOptions,
  HtmlParseOptions,
} from './parser/index.js';

// Types - export all
export * from './types/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Cells & Cleaning
export * from './cells/index.js';

// Tokenizing
export * from './tokenize/index.js';

// Classification
export * from './classify/index.js';

// Reconstruction Strategies
export * from './reconstruct/index.js';

// Header Detection
export * from './header/index.js';

// HTML Clipboard Flavour
export * from './html/index.js';

// Table Materialization
export * from './loader/index.js';
