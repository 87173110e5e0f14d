export { EngineState } from './engine-state.service.js';
export type { EngineSettings, EngineStateOptions } from './engine-state.service.js';
export { encodeSnapshot, decodeSnapshot } from './engine-snapshot.js';
export type { EngineSnapshot } from './engine-snapshot.js';
