import mongoose from 'mongoose';
import { EpochSyncState } from '../../types';

// Append-only checkpoint log
const epochSyncSchema = new mongoose.Schema<EpochSyncState>({
  startBlock: {
    type: Number,
    required: true,
    unique: true
  },
  endBlock: {
    type: Number,
    required: true
  },
  epoch: {
    type: Number,
    required: true,
    index: true
  },
  epochId: {
    type: String,
    required: true
  },
  timestamp: {
    type: Date,
    default: Date.now
  }
}, {
  versionKey: false
});

export const EpochSync = mongoose.model<EpochSyncState>('EpochSync', epochSyncSchema, 'epoch_sync');
