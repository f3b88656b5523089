import mongoose from 'mongoose';
import { DelegatorSnapshot, LedgerAnomaly } from '../../types';
import { yoctoAmount } from './amountField';

const anomalySchema = new mongoose.Schema<LedgerAnomaly>({
  code: {
    type: String,
    required: true,
    enum: ['NEGATIVE_STAKE', 'OVER_WITHDRAWAL', 'NEGATIVE_REWARD']
  },
  blockHeight: { type: Number, required: true },
  transactionHash: { type: String },
  message: { type: String, required: true }
}, { _id: false });

const delegatorSchema = new mongoose.Schema<DelegatorSnapshot>({
  delegatorId: {
    type: String,
    required: true,
    index: true
  },
  validatorAccountId: {
    type: String,
    required: true
  },
  epoch: {
    type: Number,
    required: true
  },
  epochId: {
    type: String,
    required: true
  },
  startBlockHeight: { type: Number, required: true },
  endBlockHeight: { type: Number, required: true },
  initialStake: yoctoAmount,
  autoCompoundedStake: yoctoAmount,
  totalRewardsEarned: yoctoAmount,
  pendingRewards: yoctoAmount,
  tokensWithdrawn: yoctoAmount,
  lastUpdateBlock: { type: Number, required: true },
  reportedStake: {
    type: String,
    default: null,
    validate: {
      validator: function(v: string | null) {
        return v === null || /^\d+$/.test(v);
      },
      message: 'Reported stake must be a non-negative integer string'
    }
  },
  anomalies: {
    type: [anomalySchema],
    default: []
  }
}, {
  versionKey: false
});

delegatorSchema.index({ delegatorId: 1, validatorAccountId: 1, epoch: 1 }, { unique: true });
delegatorSchema.index({ validatorAccountId: 1, epoch: -1 });

export const Delegator = mongoose.model<DelegatorSnapshot>('Delegator', delegatorSchema, 'delegators');
