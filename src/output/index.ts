export { DEFAULT_BACKUP_SUFFIX, FileSink, OutputWriteError, StdoutSink } from './sink.js';
export type { FileSinkOptions, OutputResult, OutputSink } from './sink.js';
