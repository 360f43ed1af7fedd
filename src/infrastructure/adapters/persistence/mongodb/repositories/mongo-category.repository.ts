import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Category } from '@domain/entities';
import { CategoryId } from '@domain/value-objects';
import { ICategoryRepositoryPort } from '@application/ports/outbound';
import { CategoryDocument, CategoryDocumentType } from '../schemas';
import { CategoryMapper } from '../mappers';
import { DbOperationTracker } from '../db-operation.tracker';

const COLLECTION = 'categories';

@Injectable()
export class MongoCategoryRepository implements ICategoryRepositoryPort {
  constructor(
    @InjectModel(CategoryDocument.name)
    private readonly categoryModel: Model<CategoryDocumentType>,
    private readonly tracker: DbOperationTracker,
  ) {}

  async save(category: Category): Promise<void> {
    const document = CategoryMapper.toDocument(category);

    await this.tracker.track('save', COLLECTION, async () =>
      this.categoryModel.findByIdAndUpdate(
        document._id,
        { $set: document },
        { upsert: true, new: true },
      ),
    );
  }

  async findById(id: CategoryId): Promise<Category | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.categoryModel.findById(id.toString()),
    );
    return document ? CategoryMapper.toDomain(document) : null;
  }

  async findByName(name: string): Promise<Category | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.categoryModel.findOne({ normalizedName: name.trim().toLowerCase() }),
    );
    return document ? CategoryMapper.toDomain(document) : null;
  }

  async findAll(): Promise<Category[]> {
    const documents = await this.tracker.track('find', COLLECTION, async () =>
      this.categoryModel.find().sort({ name: 1 }),
    );
    return documents.map((doc) => CategoryMapper.toDomain(doc));
  }

  async deleteAll(): Promise<void> {
    await this.tracker.track('delete', COLLECTION, async () => this.categoryModel.deleteMany({}));
  }
}
