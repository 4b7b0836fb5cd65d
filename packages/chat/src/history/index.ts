export { createHistoryWriter, historyFileName, type HistoryWriter, type HistoryWriterOptions } from './history-writer.js';
