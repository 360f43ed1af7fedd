import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { Order } from '@domain/entities';
import { OrderId } from '@domain/value-objects';
import { ConcurrencyConflictError } from '@application/errors';
import { IOrderRepositoryPort, OrderFilters } from '@application/ports/outbound';
import { OrderDocument, OrderDocumentType } from '../schemas';
import { OrderMapper } from '../mappers';
import { DbOperationTracker, isDuplicateKeyError } from '../db-operation.tracker';

const COLLECTION = 'orders';

/**
 * MongoDB implementation of IOrderRepositoryPort.
 *
 * Writes are guarded by the document version: an update only matches the
 * document if nobody else saved it since it was loaded.
 */
@Injectable()
export class MongoOrderRepository implements IOrderRepositoryPort {
  constructor(
    @InjectModel(OrderDocument.name)
    private readonly orderModel: Model<OrderDocumentType>,
    private readonly tracker: DbOperationTracker,
  ) {}

  async save(order: Order): Promise<void> {
    const document = OrderMapper.toDocument(order);
    const expectedVersion = order.version;
    const nextVersion = expectedVersion + 1;

    if (expectedVersion === 0) {
      await this.tracker.track('save', COLLECTION, async () => {
        try {
          await this.orderModel.create({ ...document, version: nextVersion });
        } catch (error) {
          if (isDuplicateKeyError(error)) {
            throw new ConcurrencyConflictError('Order', document._id, expectedVersion);
          }
          throw error;
        }
      });
    } else {
      const result = await this.tracker.track('update', COLLECTION, async () =>
        this.orderModel.updateOne(
          { _id: document._id, version: expectedVersion },
          {
            $set: {
              baristaId: document.baristaId,
              status: document.status,
              lines: document.lines,
              notes: document.notes,
              updatedAt: document.updatedAt,
              version: nextVersion,
            },
          },
        ),
      );

      if (result.matchedCount === 0) {
        throw new ConcurrencyConflictError('Order', document._id, expectedVersion);
      }
    }

    order.markPersisted(nextVersion);
  }

  async findById(id: OrderId): Promise<Order | null> {
    const document = await this.tracker.track('find', COLLECTION, async () =>
      this.orderModel.findById(id.toString()),
    );

    if (!document) {
      return null;
    }

    return OrderMapper.toDomain(document);
  }

  /**
   * Finds orders matching the filters, newest first.
   */
  async findAll(filters: OrderFilters = {}): Promise<Order[]> {
    const query: FilterQuery<OrderDocument> = {};
    if (filters.status) {
      query.status = filters.status;
    }
    if (filters.customerId) {
      query.customerId = filters.customerId;
    }
    if (filters.baristaId) {
      query.baristaId = filters.baristaId;
    }

    const documents = await this.tracker.track('find', COLLECTION, async () =>
      this.orderModel.find(query).sort({ createdAt: -1 }),
    );

    return documents.map((doc) => OrderMapper.toDomain(doc));
  }
}
