/**
 * Checkpoint Module
 */

export {
  ALL_CHECKPOINT_OPERATIONS,
  buildCheckpoint,
  computeCheckpointDigest,
  renderCheckpointSummary,
  summarizeBlock,
  verifyCheckpointDigest,
  type CheckpointData,
} from './checkpoint';
