import mongoose from 'mongoose';
import { ValidatorMetricsRecord } from '../../types';
import { yoctoAmount } from './amountField';

// Previous versions pushed on every upsert of the same epoch
export const METRICS_HISTORY_LIMIT = 100;

export interface ValidatorMetricsDocument extends ValidatorMetricsRecord {
  history: ValidatorMetricsRecord[];
}

const metricsFields = {
  validatorAccountId: { type: String, required: true },
  epoch: { type: Number, required: true },
  epochId: { type: String, required: true },
  totalStaked: yoctoAmount,
  totalDelegators: { type: Number, required: true },
  apy: { type: Number, required: true },
  rewards: yoctoAmount,
  uptime: { type: Number, default: null },
  timestamp: { type: Date, required: true }
};

const historySchema = new mongoose.Schema<ValidatorMetricsRecord>(metricsFields, { _id: false });

const validatorMetricsSchema = new mongoose.Schema<ValidatorMetricsDocument>({
  ...metricsFields,
  history: {
    type: [historySchema],
    default: []
  }
}, {
  versionKey: false
});

validatorMetricsSchema.index({ validatorAccountId: 1, epoch: 1 }, { unique: true });

export const ValidatorMetrics = mongoose.model<ValidatorMetricsDocument>('ValidatorMetrics', validatorMetricsSchema, 'validator_metrics');
