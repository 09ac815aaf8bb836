import mongoose, { HydratedDocument, Schema, Types } from 'mongoose';

export interface IProduct {
  name: string;
  price: Types.Decimal128;
  stock: number;
  createdAt: Date;
  updatedAt: Date;
}

export type ProductDocument = HydratedDocument<IProduct>;

const ProductSchema = new Schema<IProduct>(
  {
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 255
    },
    // Positivity is checked before insert; the schema only keeps the column decimal
    price: {
      type: Schema.Types.Decimal128,
      required: true
    },
    stock: {
      type: Number,
      required: true,
      min: 0,
      default: 0,
      validate: {
        validator: Number.isInteger,
        message: 'Stock must be a whole number'
      }
    }
  },
  {
    timestamps: true
  }
);

ProductSchema.index({ name: 1 });
ProductSchema.index({ stock: 1 });
ProductSchema.index({ price: 1 });

export default mongoose.model<IProduct>('Product', ProductSchema);
