import mongoose from 'mongoose';
import { EpochDataRecord } from '../../types';

/**
 * Denormalized rollup of one epoch; rebuildable from the other collections,
 * so the embedded records are stored as they are given.
 */
const epochDataSchema = new mongoose.Schema<EpochDataRecord>({
  epoch: { type: Number, required: true },
  epochId: { type: String, required: true },
  validatorAccountId: { type: String, required: true },
  startBlockHeight: { type: Number, required: true },
  endBlockHeight: { type: Number, required: true },
  timestamp: { type: Date, required: true },
  delegators: { type: [mongoose.Schema.Types.Mixed], default: [] },
  transactions: { type: [mongoose.Schema.Types.Mixed], default: [] }
}, {
  versionKey: false
});

epochDataSchema.index({ epoch: 1, validatorAccountId: 1 }, { unique: true });

export const EpochData = mongoose.model<EpochDataRecord>('EpochData', epochDataSchema, 'epoch_data');
