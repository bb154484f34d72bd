import { Collection, ObjectId } from 'mongodb';
import { NewProduct, Product, ProductPatch, isRecordId } from '../recordTypes';
import { ProductRepository } from '../productRepository';
import { ProductDocument, fromModelToProduct } from './models';
import { runStoreOperation } from './persistence';

export class MongoProductRepository implements ProductRepository {
  constructor(
    private readonly collection: Collection<ProductDocument>,
    private readonly timeoutMs: number
  ) {}

  list(): Promise<Product[]> {
    return runStoreOperation('products.list', async () => {
      const docs = await this.collection.find({}, { sort: { productId: 1 }, maxTimeMS: this.timeoutMs }).toArray();
      return docs.map(fromModelToProduct);
    });
  }

  findById(id: string): Promise<Product | null> {
    if (!isRecordId(id)) return Promise.resolve(null);
    return runStoreOperation('products.findById', async () => {
      const doc = await this.collection.findOne({ _id: new ObjectId(id) }, { maxTimeMS: this.timeoutMs });
      return doc ? fromModelToProduct(doc) : null;
    });
  }

  findByProductId(productId: number): Promise<Product | null> {
    return runStoreOperation('products.findByProductId', async () => {
      const doc = await this.collection.findOne({ productId }, { maxTimeMS: this.timeoutMs });
      return doc ? fromModelToProduct(doc) : null;
    });
  }

  highestProductId(): Promise<number | null> {
    return runStoreOperation('products.highestProductId', async () => {
      const doc = await this.collection.findOne({}, { sort: { productId: -1 }, maxTimeMS: this.timeoutMs });
      return doc ? doc.productId : null;
    });
  }

  insert(draft: NewProduct): Promise<Product> {
    return runStoreOperation('products.insert', async () => {
      const doc: ProductDocument = { _id: new ObjectId(), ...draft };
      await this.collection.insertOne(doc);
      return fromModelToProduct(doc);
    });
  }

  insertMany(drafts: NewProduct[]): Promise<Product[]> {
    if (drafts.length === 0) return Promise.resolve([]);
    return runStoreOperation('products.insertMany', async () => {
      const docs: ProductDocument[] = drafts.map(draft => ({ _id: new ObjectId(), ...draft }));
      await this.collection.insertMany(docs);
      return docs.map(fromModelToProduct);
    });
  }

  update(id: string, patch: ProductPatch): Promise<Product | null> {
    if (!isRecordId(id)) return Promise.resolve(null);
    return runStoreOperation('products.update', async () => {
      const doc = await this.collection.findOneAndUpdate(
        { _id: new ObjectId(id) },
        { $set: patch },
        { returnDocument: 'after', maxTimeMS: this.timeoutMs }
      );
      return doc ? fromModelToProduct(doc) : null;
    });
  }

  delete(id: string): Promise<boolean> {
    if (!isRecordId(id)) return Promise.resolve(false);
    return runStoreOperation('products.delete', async () => {
      const result = await this.collection.deleteOne({ _id: new ObjectId(id) });
      return result.deletedCount > 0;
    });
  }
}
