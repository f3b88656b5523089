import mongoose from 'mongoose';
import { ValidatorPerformanceRecord } from '../../types';

const validatorPerformanceSchema = new mongoose.Schema<ValidatorPerformanceRecord>({
  validatorId: { type: String, required: true },
  epoch: { type: Number, required: true },
  epochId: { type: String, required: true },
  blocksProduced: { type: Number, required: true, min: 0 },
  blocksExpected: { type: Number, required: true, min: 0 },
  blockProductionRate: { type: Number, required: true, min: 0, max: 1 },
  chunksProduced: { type: Number, required: true, min: 0 },
  chunksExpected: { type: Number, required: true, min: 0 },
  chunkProductionRate: { type: Number, required: true, min: 0, max: 1 },
  message: { type: String, required: true }
}, {
  versionKey: false
});

validatorPerformanceSchema.index({ validatorId: 1, epoch: 1 }, { unique: true });

export const ValidatorPerformance = mongoose.model<ValidatorPerformanceRecord>(
  'ValidatorPerformance',
  validatorPerformanceSchema,
  'validator_performance'
);
