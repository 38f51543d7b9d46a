export { DenoiseOrchestrator } from './DenoiseOrchestrator';
export type { DenoiseOrchestratorOptions, OrchestratorState } from './DenoiseOrchestrator';
export { ConnectionManager } from './ConnectionManager';
export type { ConnectionManagerOptions, ConnectionStatus } from './ConnectionManager';
export { AudioAccumulator } from './AudioAccumulator';
export type { AudioAccumulatorOptions } from './AudioAccumulator';
export { ReceiveLoop } from './ReceiveLoop';
export type { ReceiveLoopOptions, ReceiveLoopEndReason } from './ReceiveLoop';
export { StateTracker } from './StateTracker';
export { AsyncTaskScheduler } from './Scheduler';
export type { Scheduler, TaskHandle, BackgroundTask } from './Scheduler';
export { EventEmitterSink } from './AudioSink';
export type { AudioSink, AudioSinkEvents, DenoiseErrorEvent } from './AudioSink';
export { buildDenoiseUrl } from './denoiseUrl';
export type { DenoiseUrlParams } from './denoiseUrl';
