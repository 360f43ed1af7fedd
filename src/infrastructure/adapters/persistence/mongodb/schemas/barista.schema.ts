import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({ collection: 'baristas', _id: false, versionKey: false })
export class BaristaDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true, unique: true })
  userId!: string;

  @Prop({ required: true })
  name!: string;

  @Prop({ required: true, default: true })
  isActive!: boolean;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ type: Date, default: null })
  updatedAt!: Date | null;
}

export type BaristaDocumentType = HydratedDocument<BaristaDocument>;
export const BaristaSchema = SchemaFactory.createForClass(BaristaDocument);
