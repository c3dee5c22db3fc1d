import mongoose, { Document, Schema } from 'mongoose';

import { TransactionKind, TransactionStatus } from '../types/ledger';

export interface ITransaction extends Document {
  transactionId: string;
  userId: string;
  kind: TransactionKind;
  gross: number;
  fee: number;
  net: number;
  status: TransactionStatus;
  providerRef?: string;
  metadata?: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

// Money fields are stored rounded to 2 decimals
const toMinorUnits = (value: number): number => Math.round(value * 100) / 100;

const transactionSchema = new Schema<ITransaction>(
  {
    transactionId: {
      type: String,
      required: true,
      unique: true,
      immutable: true,
    },
    userId: {
      type: String,
      required: true,
      immutable: true,
    },
    kind: {
      type: String,
      required: true,
      enum: Object.values(TransactionKind),
      immutable: true,
    },
    gross: {
      type: Number,
      required: true,
      min: 0.01,
      immutable: true,
      set: toMinorUnits,
    },
    fee: {
      type: Number,
      required: true,
      min: 0,
      immutable: true,
      set: toMinorUnits,
    },
    net: {
      type: Number,
      required: true,
      immutable: true,
      set: toMinorUnits,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(TransactionStatus),
      default: TransactionStatus.PENDING,
      index: true,
    },
    providerRef: {
      type: String,
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
    // Managed by the ledger: updatedAt moves only on a status transition
    createdAt: {
      type: Date,
      required: true,
      immutable: true,
    },
    updatedAt: {
      type: Date,
      required: true,
    },
  },
  {
    minimize: false,
  }
);

// User history in insertion order
transactionSchema.index({ userId: 1, createdAt: 1, _id: 1 });
// Provider reference lookup for deposit confirmation
transactionSchema.index({ providerRef: 1 }, { unique: true, sparse: true });

export const Transaction = mongoose.model<ITransaction>('Transaction', transactionSchema);
