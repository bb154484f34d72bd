export interface Product {
  id: string;
  productId: number;
  name: string;
  description: string;
  price: number;
  image: string;
  category: string;
  createdAt: Date;
}

export type NewProduct = Omit<Product, 'id'>;

export type ProductPatch = Partial<Pick<Product, 'name' | 'description' | 'price' | 'image' | 'category'>>;

export interface Customer {
  name: string;
  email: string;
  phone: string;
  address: string;
}

export interface OrderItem {
  productId: number;
  quantity: number;
}

export interface Order {
  id: string;
  orderId: number;
  customer: Customer;
  items: OrderItem[];
  total: number;
  status: 'pending';
  createdAt: Date;
}

export type NewOrder = Omit<Order, 'id'>;

export interface DeliveredOrder extends Omit<Order, 'status'> {
  status: 'delivered';
  deliveredAt: Date;
}

// Record identities are 24 hex digits (document ids rendered as strings).
const RECORD_ID = /^[0-9a-f]{24}$/i;

export function isRecordId(value: string): boolean {
  return RECORD_ID.test(value);
}
