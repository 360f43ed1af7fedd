import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({ collection: 'users', _id: false, versionKey: false })
export class UserDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true, unique: true, lowercase: true })
  email!: string;

  @Prop({ required: true })
  passwordHash!: string;

  @Prop({ required: true })
  firstName!: string;

  @Prop({ required: true })
  lastName!: string;

  @Prop({ type: String, default: null })
  phoneNumber!: string | null;

  @Prop({ type: [String], required: true })
  roles!: string[];

  @Prop({ required: true, default: true })
  isActive!: boolean;

  @Prop({ required: true })
  createdAt!: Date;
}

export type UserDocumentType = HydratedDocument<UserDocument>;
export const UserSchema = SchemaFactory.createForClass(UserDocument);
