/**
 * Conversation response monitoring.
 *
 * @packageDocumentation
 */

export {
  GLOBAL_WINDOW_SIZE,
  ResponseMonitor,
  type GlobalResponseStats,
  type ResponseMonitorOptions,
  type SessionResponseStats,
} from './response-monitor.js';
