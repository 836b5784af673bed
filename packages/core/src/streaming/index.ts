export { drainLines } from './line-reader.js';
export {
  buildStreamTasks,
  formatPrefix,
  type StreamerDeps,
  type StreamOptions,
  streamLogs,
} from './log-streamer.js';
export { type Release, Semaphore } from './semaphore.js';
