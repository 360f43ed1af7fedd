import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { Barista } from '@domain/entities';
import { BaristaId, UserId } from '@domain/value-objects';
import { BaristaFilters, IBaristaRepositoryPort } from '@application/ports/outbound';
import { BaristaDocument, BaristaDocumentType } from '../schemas';
import { BaristaMapper } from '../mappers';
import { DbOperationTracker } from '../db-operation.tracker';

const COLLECTION = 'baristas';

@Injectable()
export class MongoBaristaRepository implements IBaristaRepositoryPort {
  constructor(
    @InjectModel(BaristaDocument.name)
    private readonly baristaModel: Model<BaristaDocumentType>,
    private readonly tracker: DbOperationTracker,
  ) {}

  async save(barista: Barista): Promise<void> {
    const document = BaristaMapper.toDocument(barista);

    await this.tracker.track('save', COLLECTION, async () =>
      this.baristaModel.findByIdAndUpdate(
        document._id,
        { $set: document },
        { upsert: true, new: true },
      ),
    );
  }

  async findById(id: BaristaId): Promise<Barista | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.baristaModel.findById(id.toString()),
    );
    return document ? BaristaMapper.toDomain(document) : null;
  }

  async findByUserId(userId: UserId): Promise<Barista | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.baristaModel.findOne({ userId: userId.toString() }),
    );
    return document ? BaristaMapper.toDomain(document) : null;
  }

  async findAll(filters: BaristaFilters = {}): Promise<Barista[]> {
    const query: FilterQuery<BaristaDocument> = {};
    if (filters.activeOnly) {
      query.isActive = true;
    }

    const documents = await this.tracker.track('find', COLLECTION, async () =>
      this.baristaModel.find(query).sort({ name: 1 }),
    );
    return documents.map((doc) => BaristaMapper.toDomain(doc));
  }
}
