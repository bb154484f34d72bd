import { ObjectId } from 'mongodb';
import { DuplicateRecordError } from '../errors/persistenceError';
import { DeliveredOrder, NewOrder, Order } from './recordTypes';

// Active (pending) orders.
export interface OrderRepository {
  // Newest first: createdAt descending, ties broken by orderId descending.
  list(): Promise<Order[]>;
  findById(id: string): Promise<Order | null>;
  highestOrderId(): Promise<number | null>;
  insert(draft: NewOrder): Promise<Order>;
  // Conditional delete: false when the order was already gone.
  delete(id: string): Promise<boolean>;
}

// Orders that completed the delivered transition. Records keep the identity they had while active.
export interface DeliveredOrderRepository {
  // Newest first: deliveredAt descending, ties broken by orderId descending.
  list(): Promise<DeliveredOrder[]>;
  findById(id: string): Promise<DeliveredOrder | null>;
  highestOrderId(): Promise<number | null>;
  // Fails with DuplicateRecordError when the identity is already present.
  insert(record: DeliveredOrder): Promise<DeliveredOrder>;
  delete(id: string): Promise<boolean>;
}

function highest(records: Iterable<{ orderId: number }>): number | null {
  let max: number | null = null;
  for (const record of records) {
    if (max === null || record.orderId > max) max = record.orderId;
  }
  return max;
}

// In-memory repositories for tests; the Mongo implementations back production.
export class InMemoryOrderRepository implements OrderRepository {
  private orders = new Map<string, Order>();

  // Copies of every active order, newest first.
  async list(): Promise<Order[]> {
    return [...this.orders.values()]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.orderId - a.orderId)
      .map(o => structuredClone(o));
  }

  // Reads one active order from the in-memory map.
  async findById(id: string): Promise<Order | null> {
    const found = this.orders.get(id);
    return found ? structuredClone(found) : null;
  }

  // Highest orderId among active orders.
  async highestOrderId(): Promise<number | null> {
    return highest(this.orders.values());
  }

  // Stores a new pending order under a fresh ObjectId.
  async insert(draft: NewOrder): Promise<Order> {
    const order: Order = { id: new ObjectId().toHexString(), ...structuredClone(draft) };
    if (this.orders.has(order.id)) {
      throw new DuplicateRecordError('orders.insert', `duplicate id ${order.id}`);
    }
    this.orders.set(order.id, order);
    return structuredClone(order);
  }

  // Removes an active order; false when it was not there.
  async delete(id: string): Promise<boolean> {
    return this.orders.delete(id);
  }
}

export class InMemoryDeliveredOrderRepository implements DeliveredOrderRepository {
  private delivered = new Map<string, DeliveredOrder>();

  // Copies of every delivered order, latest delivery first.
  async list(): Promise<DeliveredOrder[]> {
    return [...this.delivered.values()]
      .sort((a, b) => b.deliveredAt.getTime() - a.deliveredAt.getTime() || b.orderId - a.orderId)
      .map(o => structuredClone(o));
  }

  // Reads one delivered order from the in-memory map.
  async findById(id: string): Promise<DeliveredOrder | null> {
    const found = this.delivered.get(id);
    return found ? structuredClone(found) : null;
  }

  // Highest orderId among delivered orders.
  async highestOrderId(): Promise<number | null> {
    return highest(this.delivered.values());
  }

  // Stores a delivered copy under the identity it had while active.
  async insert(record: DeliveredOrder): Promise<DeliveredOrder> {
    if (this.delivered.has(record.id)) {
      throw new DuplicateRecordError('delivered.insert', `duplicate id ${record.id}`);
    }
    this.delivered.set(record.id, structuredClone(record));
    return structuredClone(record);
  }

  // Removes a delivered copy; false when it was not there.
  async delete(id: string): Promise<boolean> {
    return this.delivered.delete(id);
  }
}
