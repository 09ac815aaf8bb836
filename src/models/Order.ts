import mongoose, { HydratedDocument, Schema, Types } from 'mongoose';

// totalAmount is recomputed on demand from the associated products' prices.
// It is NOT kept in sync when a product's price changes later.

export interface IOrder {
  customer: Types.ObjectId;
  products: Types.ObjectId[];
  totalAmount: Types.Decimal128;
  orderDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type OrderDocument = HydratedDocument<IOrder>;

const OrderSchema = new Schema<IOrder>(
  {
    customer: {
      type: Schema.Types.ObjectId,
      ref: 'Customer',
      required: true
    },
    products: [{
      type: Schema.Types.ObjectId,
      ref: 'Product'
    }],
    totalAmount: {
      type: Schema.Types.Decimal128,
      required: true,
      default: () => Types.Decimal128.fromString('0.00')
    },
    orderDate: {
      type: Date,
      required: true,
      default: Date.now
    }
  },
  {
    timestamps: true
  }
);

// Indexes
OrderSchema.index({ customer: 1, createdAt: -1 });
OrderSchema.index({ products: 1 });
OrderSchema.index({ orderDate: -1 });

export default mongoose.model<IOrder>('Order', OrderSchema);
