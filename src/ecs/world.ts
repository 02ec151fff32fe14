/**
 * ECS world holding one entity per live (instantiated) world entity.
 *
 * The world mirrors the live-instance cache so read-only consumers
 * (visibility, networking) can query live positions without touching
 * host instances or the streaming state.
 */

import { createWorld } from 'bitecs';
import { createLiveComponents } from './components';

export function createLiveWorld() {
  return createWorld({ components: createLiveComponents() });
}

export type LiveWorld = ReturnType<typeof createLiveWorld>;
