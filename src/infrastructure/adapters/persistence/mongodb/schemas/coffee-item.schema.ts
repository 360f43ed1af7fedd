import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for the CoffeeItem aggregate.
 */
@Schema({
  collection: 'coffee_items',
  _id: false,
  versionKey: false,
})
export class CoffeeItemDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  name!: string;

  // Lower-cased copy of name, unique across the menu
  @Prop({ required: true, unique: true })
  normalizedName!: string;

  @Prop({ required: true })
  description!: string;

  @Prop({ required: true, min: 1 })
  priceCents!: number;

  @Prop({ required: true })
  currency!: string;

  @Prop({ required: true, default: true })
  isAvailable!: boolean;

  @Prop({ required: true })
  categoryId!: string;

  @Prop({ type: String, default: null })
  imageUrl!: string | null;

  @Prop({ required: true, min: 0 })
  version!: number;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ type: Date, default: null })
  updatedAt!: Date | null;
}

export type CoffeeItemDocumentType = HydratedDocument<CoffeeItemDocument>;
export const CoffeeItemSchema = SchemaFactory.createForClass(CoffeeItemDocument);

CoffeeItemSchema.index({ categoryId: 1, isAvailable: 1 });
