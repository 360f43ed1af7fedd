import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { User } from '@domain/entities';
import { UserId } from '@domain/value-objects';
import { IUserRepositoryPort } from '@application/ports/outbound';
import { UserDocument, UserDocumentType } from '../schemas';
import { UserMapper } from '../mappers';
import { DbOperationTracker } from '../db-operation.tracker';

const COLLECTION = 'users';

@Injectable()
export class MongoUserRepository implements IUserRepositoryPort {
  constructor(
    @InjectModel(UserDocument.name)
    private readonly userModel: Model<UserDocumentType>,
    private readonly tracker: DbOperationTracker,
  ) {}

  async save(user: User): Promise<void> {
    const document = UserMapper.toDocument(user);

    await this.tracker.track('save', COLLECTION, async () =>
      this.userModel.findByIdAndUpdate(
        document._id,
        { $set: document },
        { upsert: true, new: true },
      ),
    );
  }

  async findById(id: UserId): Promise<User | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.userModel.findById(id.toString()),
    );
    return document ? UserMapper.toDomain(document) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.userModel.findOne({ email: email.trim().toLowerCase() }),
    );
    return document ? UserMapper.toDomain(document) : null;
  }
}
