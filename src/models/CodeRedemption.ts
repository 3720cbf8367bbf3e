import mongoose, { Document, Schema } from 'mongoose';

export interface ICodeRedemption extends Document {
  redemptionId: string;
  code: string;
  userId: string;
  ledgerEntryId: string;
  redeemedAt: Date;
}

const codeRedemptionSchema = new Schema<ICodeRedemption>({
  redemptionId: {
    type: String,
    required: true,
    unique: true,
    index: true,
  },
  code: {
    type: String,
    required: true,
  },
  userId: {
    type: String,
    required: true,
  },
  ledgerEntryId: {
    type: String,
    required: true,
  },
  redeemedAt: {
    type: Date,
    required: true,
  },
});

// Idempotency fence: one redemption per user per code
codeRedemptionSchema.index({ code: 1, userId: 1 }, { unique: true });

export const CodeRedemptionModel = mongoose.model<ICodeRedemption>(
  'CodeRedemption',
  codeRedemptionSchema
);
