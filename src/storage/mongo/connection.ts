// The official MongoDB driver is the document store client.
import { Collection, MongoClient } from 'mongodb';
import { DeliveredOrderDocument, OrderDocument, ProductDocument } from './models';

export interface StoreConnection {
  products: Collection<ProductDocument>;
  orders: Collection<OrderDocument>;
  delivered: Collection<DeliveredOrderDocument>;
  // Per-operation bound applied to reads via maxTimeMS.
  timeoutMs: number;
  close(): Promise<void>;
}

// Connects and pings so an unreachable store fails startup instead of the first request.
export async function connectToStore(uri: string, dbName: string, timeoutMs: number): Promise<StoreConnection> {
  const client = new MongoClient(uri, {
    serverSelectionTimeoutMS: timeoutMs,
    connectTimeoutMS: timeoutMs,
    socketTimeoutMS: timeoutMs * 2,
  });
  await client.connect();
  const db = client.db(dbName);
  await db.command({ ping: 1 });

  return {
    products: db.collection<ProductDocument>('products'),
    orders: db.collection<OrderDocument>('orders'),
    delivered: db.collection<DeliveredOrderDocument>('delivered'),
    timeoutMs,
    close: () => client.close(),
  };
}
