import { Collection, ObjectId } from 'mongodb';
import { DeliveredOrder, NewOrder, Order, isRecordId } from '../recordTypes';
import { DeliveredOrderRepository, OrderRepository } from '../orderRepository';
import {
  DeliveredOrderDocument,
  OrderDocument,
  fromDeliveredOrderToModel,
  fromModelToDeliveredOrder,
  fromModelToOrder,
} from './models';
import { runStoreOperation } from './persistence';

export class MongoOrderRepository implements OrderRepository {
  constructor(
    private readonly collection: Collection<OrderDocument>,
    private readonly timeoutMs: number
  ) {}

  list(): Promise<Order[]> {
    return runStoreOperation('orders.list', async () => {
      const docs = await this.collection
        .find({}, { sort: { createdAt: -1, orderId: -1 }, maxTimeMS: this.timeoutMs })
        .toArray();
      return docs.map(fromModelToOrder);
    });
  }

  findById(id: string): Promise<Order | null> {
    if (!isRecordId(id)) return Promise.resolve(null);
    return runStoreOperation('orders.findById', async () => {
      const doc = await this.collection.findOne({ _id: new ObjectId(id) }, { maxTimeMS: this.timeoutMs });
      return doc ? fromModelToOrder(doc) : null;
    });
  }

  highestOrderId(): Promise<number | null> {
    return runStoreOperation('orders.highestOrderId', async () => {
      const doc = await this.collection.findOne({}, { sort: { orderId: -1 }, maxTimeMS: this.timeoutMs });
      return doc ? doc.orderId : null;
    });
  }

  insert(draft: NewOrder): Promise<Order> {
    return runStoreOperation('orders.insert', async () => {
      const doc: OrderDocument = { _id: new ObjectId(), ...draft };
      await this.collection.insertOne(doc);
      return fromModelToOrder(doc);
    });
  }

  delete(id: string): Promise<boolean> {
    if (!isRecordId(id)) return Promise.resolve(false);
    return runStoreOperation('orders.delete', async () => {
      const result = await this.collection.deleteOne({ _id: new ObjectId(id) });
      return result.deletedCount > 0;
    });
  }
}

export class MongoDeliveredOrderRepository implements DeliveredOrderRepository {
  constructor(
    private readonly collection: Collection<DeliveredOrderDocument>,
    private readonly timeoutMs: number
  ) {}

  list(): Promise<DeliveredOrder[]> {
    return runStoreOperation('delivered.list', async () => {
      const docs = await this.collection
        .find({}, { sort: { deliveredAt: -1, orderId: -1 }, maxTimeMS: this.timeoutMs })
        .toArray();
      return docs.map(fromModelToDeliveredOrder);
    });
  }

  findById(id: string): Promise<DeliveredOrder | null> {
    if (!isRecordId(id)) return Promise.resolve(null);
    return runStoreOperation('delivered.findById', async () => {
      const doc = await this.collection.findOne({ _id: new ObjectId(id) }, { maxTimeMS: this.timeoutMs });
      return doc ? fromModelToDeliveredOrder(doc) : null;
    });
  }

  highestOrderId(): Promise<number | null> {
    return runStoreOperation('delivered.highestOrderId', async () => {
      const doc = await this.collection.findOne({}, { sort: { orderId: -1 }, maxTimeMS: this.timeoutMs });
      return doc ? doc.orderId : null;
    });
  }

  insert(record: DeliveredOrder): Promise<DeliveredOrder> {
    return runStoreOperation('delivered.insert', async () => {
      await this.collection.insertOne(fromDeliveredOrderToModel(record));
      return record;
    });
  }

  delete(id: string): Promise<boolean> {
    if (!isRecordId(id)) return Promise.resolve(false);
    return runStoreOperation('delivered.delete', async () => {
      const result = await this.collection.deleteOne({ _id: new ObjectId(id) });
      return result.deletedCount > 0;
    });
  }
}
