import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({ collection: 'categories', _id: false, versionKey: false })
export class CategoryDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  name!: string;

  @Prop({ required: true, unique: true })
  normalizedName!: string;

  @Prop({ type: String, default: null })
  description!: string | null;

  @Prop({ required: true })
  createdAt!: Date;
}

export type CategoryDocumentType = HydratedDocument<CategoryDocument>;
export const CategorySchema = SchemaFactory.createForClass(CategoryDocument);
