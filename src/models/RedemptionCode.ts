import mongoose, { Document, Schema } from 'mongoose';

export interface IRedemptionCode extends Document {
  code: string;
  codeType: string;
  currencyKind: string;
  amount: number;
  maxUses: number;
  currentUses: number;
  validFrom: Date;
  validUntil: Date;
  status: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

const redemptionCodeSchema = new Schema<IRedemptionCode>(
  {
    code: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    codeType: {
      type: String,
      required: true,
      enum: ['promotion', 'gift', 'event'],
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
    maxUses: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
    currentUses: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
    validFrom: {
      type: Date,
      required: true,
    },
    validUntil: {
      type: Date,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: ['active', 'expired', 'disabled'],
      default: 'active',
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
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

redemptionCodeSchema.index({ createdAt: -1 });

export const RedemptionCodeModel = mongoose.model<IRedemptionCode>(
  'RedemptionCode',
  redemptionCodeSchema
);
