import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Customer } from '@domain/entities';
import { CustomerId } from '@domain/value-objects';
import { ICustomerRepositoryPort } from '@application/ports/outbound';
import { CustomerDocument, CustomerDocumentType } from '../schemas';
import { CustomerMapper } from '../mappers';
import { DbOperationTracker } from '../db-operation.tracker';

const COLLECTION = 'customers';

@Injectable()
export class MongoCustomerRepository implements ICustomerRepositoryPort {
  constructor(
    @InjectModel(CustomerDocument.name)
    private readonly customerModel: Model<CustomerDocumentType>,
    private readonly tracker: DbOperationTracker,
  ) {}

  async save(customer: Customer): Promise<void> {
    const document = CustomerMapper.toDocument(customer);

    await this.tracker.track('save', COLLECTION, async () =>
      this.customerModel.findByIdAndUpdate(
        document._id,
        { $set: document },
        { upsert: true, new: true },
      ),
    );
  }

  async findById(id: CustomerId): Promise<Customer | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.customerModel.findById(id.toString()),
    );
    return document ? CustomerMapper.toDomain(document) : null;
  }

  async findByEmail(email: string): Promise<Customer | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.customerModel.findOne({ email: email.trim().toLowerCase() }),
    );
    return document ? CustomerMapper.toDomain(document) : null;
  }

  async findAll(): Promise<Customer[]> {
    const documents = await this.tracker.track('find', COLLECTION, async () =>
      this.customerModel.find().sort({ name: 1 }),
    );
    return documents.map((doc) => CustomerMapper.toDomain(doc));
  }
}
