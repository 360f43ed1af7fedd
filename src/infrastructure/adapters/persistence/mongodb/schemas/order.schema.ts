import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose subdocument for order lines.
 * Name and price are snapshots taken when the order was placed.
 */
@Schema({ _id: false })
export class OrderLineDocument {
  @Prop({ required: true })
  coffeeItemId!: string;

  @Prop({ required: true })
  itemName!: string;

  @Prop({ required: true, min: 1, max: 10 })
  quantity!: number;

  @Prop({ required: true })
  unitPriceCents!: number;

  @Prop({ required: true })
  currency!: string;

  @Prop({ type: String, default: null })
  specialInstructions!: string | null;
}

export const OrderLineSchema = SchemaFactory.createForClass(OrderLineDocument);

/**
 * Mongoose document for the Order aggregate.
 * `version` backs the optimistic concurrency check on save.
 */
@Schema({
  collection: 'orders',
  _id: false, // Disable auto ObjectId, we use custom string _id
  versionKey: false,
})
export class OrderDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  customerId!: string;

  @Prop({ type: String, default: null })
  baristaId!: string | null;

  @Prop({ required: true })
  orderDate!: Date;

  @Prop({ required: true })
  status!: string;

  @Prop({ type: [OrderLineSchema], default: [] })
  lines!: OrderLineDocument[];

  @Prop({ type: String, default: null })
  notes!: string | null;

  @Prop({ required: true, min: 0 })
  version!: number;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ type: Date, default: null })
  updatedAt!: Date | null;
}

export type OrderDocumentType = HydratedDocument<OrderDocument>;
export const OrderSchema = SchemaFactory.createForClass(OrderDocument);

// Indexes for the list filters
OrderSchema.index({ customerId: 1, createdAt: -1 });
OrderSchema.index({ baristaId: 1, createdAt: -1 });
OrderSchema.index({ status: 1, createdAt: -1 });
