/**
 * Tablepaste Engine - Loader Module Exports
 */

export { defaultColumnName, uniqueColumnNames, buildTableData } from './TableLoader.js';
export type { BuildTableOptions } from './TableLoader.js';
