/**
 * trainlog core - training log extraction and episode tables
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { processRun, CsvRunSink } from '@trainlog/core';
 *
 * const report = await processRun({
 *   runName: 'run1',
 *   inputDir: './data/run1',
 *   sink: new CsvRunSink('./output/run1'),
 * });
 * console.log(`${report.linesParsed}/${report.totalLinesSeen} lines parsed`);
 * ```
 */

export * from './types.js';
export * from './errors.js';
export * from './extract/index.js';
export * from './reduce/index.js';
export * from './output/index.js';
export * from './config/index.js';
export * from './run/index.js';
export * from './report/index.js';
