export { CheckpointManager, DEFAULT_CHECKPOINT_INTERVAL } from './checkpoint-manager.js'
export type { CheckpointState, CheckpointPhase, ResumePoint, CheckpointOptions } from './checkpoint-manager.js'
