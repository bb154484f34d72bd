import { ObjectId } from 'mongodb';
import { Customer, DeliveredOrder, Order, OrderItem, Product } from '../recordTypes';

export interface ProductDocument {
  _id: ObjectId;
  productId: number;
  name: string;
  description: string;
  price: number;
  image: string;
  category: string;
  createdAt: Date;
}

export interface OrderDocument {
  _id: ObjectId;
  orderId: number;
  customer: Customer;
  items: OrderItem[];
  total: number;
  status: 'pending';
  createdAt: Date;
}

export interface DeliveredOrderDocument extends Omit<OrderDocument, 'status'> {
  status: 'delivered';
  deliveredAt: Date;
}

export const fromModelToProduct = (doc: ProductDocument): Product => ({
  id: doc._id.toHexString(),
  productId: doc.productId,
  name: doc.name,
  description: doc.description ?? '',
  price: doc.price,
  image: doc.image ?? '',
  category: doc.category,
  createdAt: doc.createdAt,
});

const toCustomer = (customer: Customer | undefined): Customer => ({
  name: customer?.name ?? '',
  email: customer?.email ?? '',
  phone: customer?.phone ?? '',
  address: customer?.address ?? '',
});

const toItems = (items: OrderItem[] | undefined): OrderItem[] =>
  (items ?? []).map(i => ({ productId: i.productId, quantity: i.quantity }));

export const fromModelToOrder = (doc: OrderDocument): Order => ({
  id: doc._id.toHexString(),
  orderId: doc.orderId,
  customer: toCustomer(doc.customer),
  items: toItems(doc.items),
  total: doc.total,
  status: 'pending',
  createdAt: doc.createdAt,
});

export const fromModelToDeliveredOrder = (doc: DeliveredOrderDocument): DeliveredOrder => ({
  id: doc._id.toHexString(),
  orderId: doc.orderId,
  customer: toCustomer(doc.customer),
  items: toItems(doc.items),
  total: doc.total,
  status: 'delivered',
  createdAt: doc.createdAt,
  deliveredAt: doc.deliveredAt,
});

export const fromDeliveredOrderToModel = (record: DeliveredOrder): DeliveredOrderDocument => ({
  _id: new ObjectId(record.id),
  orderId: record.orderId,
  customer: record.customer,
  items: record.items,
  total: record.total,
  status: 'delivered',
  createdAt: record.createdAt,
  deliveredAt: record.deliveredAt,
});
