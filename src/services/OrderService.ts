import { InvalidInputError, NotFoundError } from '../errors/httpError';
import { ConsistencyError, DuplicateRecordError, PersistenceError } from '../errors/persistenceError';
import { describeError, logError, logInfo, logWarn } from '../logger';
import { KeyedMutex } from '../storage/locks';
import { DeliveredOrderRepository, OrderRepository } from '../storage/orderRepository';
import { ProductRepository } from '../storage/productRepository';
import { DeliveredOrder, Order, OrderItem, isRecordId } from '../storage/recordTypes';
import { CreateOrderInput } from '../storefront/schemas';
import { SequenceGenerator } from './SequenceGenerator';

export interface DeliveryReceipt {
  orderId: number;
  deliveredAt: Date;
}

// Money is summed in floating point and rounded to cents once.
function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

function parseRecordId(id: string): string {
  if (!isRecordId(id)) {
    throw new InvalidInputError('Invalid order ID format');
  }
  return id.toLowerCase();
}

// Owns order creation and the pending -> delivered transition across the two order collections.
export class OrderService {
  private transitions = new KeyedMutex();

  constructor(
    private readonly products: ProductRepository,
    private readonly orders: OrderRepository,
    private readonly delivered: DeliveredOrderRepository,
    private readonly sequence: SequenceGenerator
  ) {}

  // Prices every item from the store, assigns the next orderId, and persists a pending order.
  async create(input: CreateOrderInput): Promise<Order> {
    if (input.items.length === 0) {
      throw new InvalidInputError('Order must contain at least one item');
    }
    const items: OrderItem[] = input.items.map(i => ({ productId: i.productId, quantity: i.quantity }));
    const total = await this.computeTotal(items);

    const order = await this.sequence.assign('order', orderId =>
      this.orders.insert({
        orderId,
        customer: { ...input.customer },
        items,
        total,
        status: 'pending',
        createdAt: new Date(),
      })
    );
    logInfo('order_created', { id: order.id, orderId: order.orderId, items: items.length, total });
    return order;
  }

  // A product missing from the store contributes nothing. Whether that should reject the order
  // instead is an open product decision; store failures still propagate.
  private async computeTotal(items: OrderItem[]): Promise<number> {
    let total = 0;
    for (const item of items) {
      const product = await this.products.findByProductId(item.productId);
      if (product) {
        total += product.price * item.quantity;
      } else {
        logWarn('order_item_unknown_product', { productId: item.productId });
      }
    }
    if (!Number.isFinite(total)) {
      throw new InvalidInputError('Order total is out of range');
    }
    return roundToCents(total);
  }

  list(): Promise<Order[]> {
    return this.orders.list();
  }

  // Lookup is by record identity only; the human-facing orderId is not accepted here.
  async get(id: string): Promise<Order> {
    const order = await this.orders.findById(parseRecordId(id));
    if (!order) {
      throw new NotFoundError('Order not found');
    }
    return order;
  }

  listDelivered(): Promise<DeliveredOrder[]> {
    return this.delivered.list();
  }

  /**
   * Moves a pending order into the delivered collection: insert the delivered copy first,
   * then delete the active one, so a crash in between leaves two copies rather than none.
   * If the delete fails the inserted copy is removed again; if that also fails the order is
   * left in both collections and a ConsistencyError is raised for manual reconciliation.
   *
   * Calls for the same record are serialized, so a second call observes NotFound.
   */
  async markDelivered(id: string): Promise<DeliveryReceipt> {
    const recordId = parseRecordId(id);
    return this.transitions.runExclusive(recordId, () => this.transition(recordId));
  }

  private async transition(recordId: string): Promise<DeliveryReceipt> {
    const order = await this.orders.findById(recordId);
    if (!order) {
      throw new NotFoundError('Order not found');
    }

    const deliveredAt = new Date();
    const record: DeliveredOrder = { ...order, status: 'delivered', deliveredAt };

    try {
      await this.delivered.insert(record);
    } catch (err) {
      if (err instanceof DuplicateRecordError) {
        logError('order_delivery_inconsistent', {
          id: recordId,
          orderId: order.orderId,
          reason: 'delivered copy already exists while order is still active',
        });
        throw new ConsistencyError(recordId, order.orderId, 'order present in both collections', err);
      }
      throw err;
    }

    let removed: boolean;
    try {
      removed = await this.orders.delete(recordId);
    } catch (deleteErr) {
      await this.compensate(record, deleteErr);
      throw deleteErr instanceof PersistenceError ? deleteErr : new PersistenceError('orders.delete', deleteErr);
    }

    // Nothing left to delete means the active copy is already gone; the delivered copy is the only one.
    if (!removed) {
      logWarn('order_delivery_active_copy_missing', { id: recordId, orderId: order.orderId });
    }

    logInfo('order_delivered', { id: recordId, orderId: order.orderId });
    return { orderId: order.orderId, deliveredAt };
  }

  // Undo step for a failed active-side delete. Raises ConsistencyError when the undo fails too.
  private async compensate(record: DeliveredOrder, deleteErr: unknown): Promise<void> {
    try {
      await this.delivered.delete(record.id);
    } catch (compensationErr) {
      logError('order_delivery_inconsistent', {
        id: record.id,
        orderId: record.orderId,
        reason: 'active delete and compensating delete both failed',
        ...describeError(compensationErr),
      });
      throw new ConsistencyError(record.id, record.orderId, 'order present in both collections', compensationErr);
    }
    logWarn('order_delivery_compensated', {
      id: record.id,
      orderId: record.orderId,
      ...describeError(deleteErr),
    });
  }
}
