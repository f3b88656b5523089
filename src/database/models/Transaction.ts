import mongoose from 'mongoose';
import { StakingTransaction } from '../../types';
import { yoctoAmount } from './amountField';

const transactionSchema = new mongoose.Schema<StakingTransaction>({
  transactionHash: {
    type: String,
    required: true,
    unique: true
  },
  amount: yoctoAmount,
  method: {
    type: String,
    required: true
  },
  action: {
    type: String,
    required: true
  },
  type: {
    type: String,
    required: true,
    enum: ['stake', 'unstake', 'withdraw', 'deposit'],
    index: true
  },
  blockHeight: {
    type: Number,
    required: true,
    index: true
  },
  timestamp: {
    type: Date,
    required: true
  },
  delegatorAddress: {
    type: String,
    required: true,
    index: true
  },
  gasFee: yoctoAmount
}, {
  versionKey: false
});

transactionSchema.index({ delegatorAddress: 1, blockHeight: -1 });

export const Transaction = mongoose.model<StakingTransaction>('Transaction', transactionSchema, 'transactions');
