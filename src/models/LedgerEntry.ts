import mongoose, { Document, Schema } from 'mongoose';

export interface ILedgerEntry extends Document {
  entryId: string;
  ownerId: string;
  kind: string;
  currencyKind: string;
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
  status: string;
  externalRequestRef?: string;
  requester?: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

const ledgerEntrySchema = new Schema<ILedgerEntry>(
  {
    entryId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    ownerId: {
      type: String,
      required: true,
    },
    kind: {
      type: String,
      required: true,
      enum: ['grant', 'consume', 'refund', 'expire', 'compensate'],
    },
    currencyKind: {
      type: String,
      required: true,
      enum: ['paid', 'free'],
    },
    amount: {
      type: Number,
      required: true,
      min: 1,
    },
    balanceBefore: {
      type: Number,
      required: true,
    },
    balanceAfter: {
      type: Number,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: ['pending', 'completed', 'failed', 'cancelled'],
    },
    externalRequestRef: {
      type: String,
      sparse: true,
      index: true,
    },
    requester: {
      type: String,
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
    // Set by the entry itself so the ledger records the service clock
    createdAt: {
      type: Date,
      required: true,
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

// Owner history, newest first
ledgerEntrySchema.index({ ownerId: 1, createdAt: -1 });
// History filtered by currency kind
ledgerEntrySchema.index({ ownerId: 1, currencyKind: 1, createdAt: -1 });

export const LedgerEntryModel = mongoose.model<ILedgerEntry>('LedgerEntry', ledgerEntrySchema);
