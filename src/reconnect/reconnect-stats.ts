/**
 * ReconnectStats — counters for what the daemon has seen and done
 *
 * Updated in place by the dispatcher and the reconnect procedure.
 */

export interface ReconnectStats {
  notifications: number;
  connectsObserved: number;
  flakyDisconnects: number;
  normalDisconnects: number;
  attemptsScheduled: number;
  attemptsCancelled: number;
  attemptsRun: number;
  queryFailures: number;
  skippedConnected: number;
  skippedUntrusted: number;
  connectRequests: number;
  connectSuccesses: number;
  connectFailures: number;
}

export function createReconnectStats(): ReconnectStats {
  return {
    notifications: 0,
    connectsObserved: 0,
    flakyDisconnects: 0,
    normalDisconnects: 0,
    attemptsScheduled: 0,
    attemptsCancelled: 0,
    attemptsRun: 0,
    queryFailures: 0,
    skippedConnected: 0,
    skippedUntrusted: 0,
    connectRequests: 0,
    connectSuccesses: 0,
    connectFailures: 0,
  };
}
