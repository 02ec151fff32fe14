export * from './types';
export * from './config';
export * from './errors';
export { createLogger, getLogLevel, setLogLevel, type LogLevel, type Logger } from './core/logger';
export { EventBus, type StreamingEventMap, type StreamingEvents } from './core/eventBus';
export { PerfMonitor, type PerfSnapshot } from './core/perfMonitor';
export { spiralOrder, worldToChunk } from './core/math';

export { SpatialChunkIndex, categorize, chunkSizeFor, keyFor, type ChunkGridConfig } from './world/chunkIndex';
export { EntityStore, cloneRecord, normalizeUid, type UidGenerator } from './world/entityStore';
export {
  ChunkRequirementTracker,
  type ChunkTransitionHandler,
  type RequirementOracle,
} from './world/chunkRequirements';
export {
  StreamingScheduler,
  defaultClock,
  type Clock,
  type SchedulerConfig,
  type TickReport,
} from './world/streamingScheduler';
export {
  WorldStreamer,
  type SaveOptions,
  type StreamerStats,
  type WorldStreamerOptions,
} from './world/worldStreamer';

export { LiveInstanceCache, type LiveEntry, type LivePosition } from './ecs/liveInstanceCache';
export { createLiveWorld, type LiveWorld } from './ecs/world';

export type { InstanceFactory } from './host/instanceFactory';
export { Object3DFactory, type Object3DBuilder, type RegisterOptions } from './host/object3dFactory';

export { diffProperties, mergeProperties, valuesEqual } from './persistence/propertyDiff';
export { formatLine, parseLine, parseWorld, serializeWorld, type ParsedWorld } from './persistence/worldFile';
export { Persistence, type PersistenceSummary, type SnapshotChange } from './persistence/persistence';
