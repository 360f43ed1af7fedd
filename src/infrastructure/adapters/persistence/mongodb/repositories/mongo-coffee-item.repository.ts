import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { CoffeeItem } from '@domain/entities';
import { CoffeeItemId } from '@domain/value-objects';
import { ConcurrencyConflictError, DuplicateNameError } from '@application/errors';
import { CoffeeItemFilters, ICoffeeItemRepositoryPort } from '@application/ports/outbound';
import { CoffeeItemDocument, CoffeeItemDocumentType } from '../schemas';
import { CoffeeItemMapper } from '../mappers';
import {
  DbOperationTracker,
  isDuplicateKeyError,
  isDuplicateKeyOn,
} from '../db-operation.tracker';

const COLLECTION = 'coffee_items';

/**
 * MongoDB implementation of ICoffeeItemRepositoryPort.
 * Same versioned write as MongoOrderRepository. A write that collides with
 * another item's name surfaces as DuplicateNameError, on insert and on rename.
 */
@Injectable()
export class MongoCoffeeItemRepository implements ICoffeeItemRepositoryPort {
  constructor(
    @InjectModel(CoffeeItemDocument.name)
    private readonly coffeeItemModel: Model<CoffeeItemDocumentType>,
    private readonly tracker: DbOperationTracker,
  ) {}

  async save(item: CoffeeItem): Promise<void> {
    const document = CoffeeItemMapper.toDocument(item);
    const expectedVersion = item.version;
    const nextVersion = expectedVersion + 1;

    if (expectedVersion === 0) {
      await this.tracker.track('save', COLLECTION, async () => {
        try {
          await this.coffeeItemModel.create({ ...document, version: nextVersion });
        } catch (error) {
          if (isDuplicateKeyOn(error, 'normalizedName')) {
            throw new DuplicateNameError('Coffee item', document.name);
          }
          if (isDuplicateKeyError(error)) {
            throw new ConcurrencyConflictError('CoffeeItem', document._id, expectedVersion);
          }
          throw error;
        }
      });
    } else {
      const result = await this.tracker.track('update', COLLECTION, async () => {
        try {
          return await this.coffeeItemModel.updateOne(
            { _id: document._id, version: expectedVersion },
            {
              $set: {
                name: document.name,
                normalizedName: document.normalizedName,
                description: document.description,
                priceCents: document.priceCents,
                currency: document.currency,
                isAvailable: document.isAvailable,
                categoryId: document.categoryId,
                imageUrl: document.imageUrl,
                updatedAt: document.updatedAt,
                version: nextVersion,
              },
            },
          );
        } catch (error) {
          if (isDuplicateKeyOn(error, 'normalizedName')) {
            throw new DuplicateNameError('Coffee item', document.name);
          }
          throw error;
        }
      });

      if (result.matchedCount === 0) {
        throw new ConcurrencyConflictError('CoffeeItem', document._id, expectedVersion);
      }
    }

    item.markPersisted(nextVersion);
  }

  async findById(id: CoffeeItemId): Promise<CoffeeItem | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.coffeeItemModel.findById(id.toString()),
    );

    return document ? CoffeeItemMapper.toDomain(document) : null;
  }

  async findByIds(ids: readonly CoffeeItemId[]): Promise<CoffeeItem[]> {
    if (ids.length === 0) {
      return [];
    }

    const documents = await this.tracker.track('find', COLLECTION, async () =>
      this.coffeeItemModel.find({ _id: { $in: ids.map((id) => id.toString()) } }),
    );

    return documents.map((doc) => CoffeeItemMapper.toDomain(doc));
  }

  async findAll(filters: CoffeeItemFilters = {}): Promise<CoffeeItem[]> {
    const query: FilterQuery<CoffeeItemDocument> = {};
    if (filters.availableOnly) {
      query.isAvailable = true;
    }
    if (filters.categoryId) {
      query.categoryId = filters.categoryId;
    }

    const documents = await this.tracker.track('find', COLLECTION, async () =>
      this.coffeeItemModel.find(query).sort({ name: 1 }),
    );

    return documents.map((doc) => CoffeeItemMapper.toDomain(doc));
  }

  async existsByName(name: string): Promise<boolean> {
    const count = await this.tracker.track('find', COLLECTION, async () =>
      this.coffeeItemModel.countDocuments({
        normalizedName: CoffeeItemMapper.normalizeName(name),
      }),
    );
    return count > 0;
  }

  async count(): Promise<number> {
    return this.tracker.track('find', COLLECTION, async () =>
      this.coffeeItemModel.countDocuments(),
    );
  }

  async deleteAll(): Promise<void> {
    await this.tracker.track('delete', COLLECTION, async () => this.coffeeItemModel.deleteMany({}));
  }
}
