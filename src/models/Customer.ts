import mongoose, { HydratedDocument, Schema } from 'mongoose';

export interface ICustomer {
  name: string;
  email: string;
  phone?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type CustomerDocument = HydratedDocument<ICustomer>;

const CustomerSchema = new Schema<ICustomer>(
  {
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 255
    },
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true
    },
    phone: {
      type: String,
      trim: true,
      maxlength: 20
    }
  },
  {
    timestamps: true
  }
);

// email is indexed through `unique: true`; the service checks it before insert too
CustomerSchema.index({ name: 1 });
CustomerSchema.index({ createdAt: -1 });

export default mongoose.model<ICustomer>('Customer', CustomerSchema);
