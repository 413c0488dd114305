/**
 * Tablepaste Engine
 *
 * Rebuilds clean rectangular tables from raw clipboard pastes:
 * - Title-line filtering and tab/comma separator detection
 * - Structural classification of known paste layouts (split rank rows,
 *   spanning headers, wrapped multi-line headers, footnoted tables)
 * - One reconstruction strategy per paste, with a plain fallback
 * - Header detection and footnote cleanup
 *
 * @example
 * ```typescript
 * import { parseClipboardText, buildTableData } from 'tablepaste';
 *
 * const table = parseClipboardText('City\tPopulation\nOslo[a]\t709,037');
 *
 * if (table) {
 *   console.log(table.hasHeaders); // true
 *   console.log(buildTableData(table).records); // [['Oslo', '709,037']]
 * }
 * ```
 */

export * from './core/index.js';
