import mongoose, { Document, Schema } from 'mongoose';

export interface ICurrencyAccount extends Document {
  ownerId: string;
  currencyKind: string;
  balance: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const currencyAccountSchema = new Schema<ICurrencyAccount>(
  {
    ownerId: {
      type: String,
      required: true,
    },
    currencyKind: {
      type: String,
      required: true,
      enum: ['paid', 'free'],
    },
    balance: {
      type: Number,
      required: true,
      default: 0,
    },
    version: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
  },
  {
    timestamps: true,
  }
);

// One account per owner and currency kind
currencyAccountSchema.index({ ownerId: 1, currencyKind: 1 }, { unique: true });

export const CurrencyAccountModel = mongoose.model<ICurrencyAccount>(
  'CurrencyAccount',
  currencyAccountSchema
);
