/**
 * Mutable server state shared by the route plugins.
 *
 * Routes read it per request, so tests can swap the services between cases.
 */

import type { Services } from 'mendgraph-core';
import type { SseStreams } from './sse.js';

export interface AppState {
  services: Services;
  streams: SseStreams;
  startedAt: number;
}

let _state: AppState | null = null;

export function initAppState(state: AppState): AppState {
  _state = state;
  return _state;
}

export function getAppState(): AppState {
  if (!_state) throw new Error('AppState not initialized');
  return _state;
}
