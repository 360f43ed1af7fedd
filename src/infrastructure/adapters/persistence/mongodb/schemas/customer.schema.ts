import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({ collection: 'customers', _id: false, versionKey: false })
export class CustomerDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  name!: string;

  @Prop({ required: true, unique: true, lowercase: true })
  email!: string;

  @Prop({ type: String, default: null })
  phone!: string | null;

  @Prop({ type: String, default: null })
  address!: string | null;

  @Prop({ type: String, default: null, index: true })
  userId!: string | null;

  @Prop({ required: true })
  createdAt!: Date;
}

export type CustomerDocumentType = HydratedDocument<CustomerDocument>;
export const CustomerSchema = SchemaFactory.createForClass(CustomerDocument);
