import { ObjectId } from 'mongodb';
import { DuplicateRecordError } from '../errors/persistenceError';
import { NewProduct, Product, ProductPatch } from './recordTypes';

// Abstracts the products collection behind the primitives the catalog needs.
export interface ProductRepository {
  // All products, ascending productId.
  list(): Promise<Product[]>;
  findById(id: string): Promise<Product | null>;
  findByProductId(productId: number): Promise<Product | null>;
  // Highest productId in the collection, or null when it is empty.
  highestProductId(): Promise<number | null>;
  insert(draft: NewProduct): Promise<Product>;
  insertMany(drafts: NewProduct[]): Promise<Product[]>;
  // Returns the updated product, or null when no product has that identity.
  update(id: string, patch: ProductPatch): Promise<Product | null>;
  // Returns false when nothing was deleted.
  delete(id: string): Promise<boolean>;
}

// In-memory repository for tests and single-process embedding; MongoProductRepository backs production.
export class InMemoryProductRepository implements ProductRepository {
  private products = new Map<string, Product>();

  // Copies of every product, ordered by productId.
  async list(): Promise<Product[]> {
    return [...this.products.values()].sort((a, b) => a.productId - b.productId).map(p => structuredClone(p));
  }

  // Reads a product by record identity.
  async findById(id: string): Promise<Product | null> {
    const found = this.products.get(id);
    return found ? structuredClone(found) : null;
  }

  // Scans for the product carrying a catalog number.
  async findByProductId(productId: number): Promise<Product | null> {
    for (const product of this.products.values()) {
      if (product.productId === productId) return structuredClone(product);
    }
    return null;
  }

  // Highest productId in the map, or null when empty.
  async highestProductId(): Promise<number | null> {
    let highest: number | null = null;
    for (const product of this.products.values()) {
      if (highest === null || product.productId > highest) highest = product.productId;
    }
    return highest;
  }

  // Stores a new product under a fresh ObjectId.
  async insert(draft: NewProduct): Promise<Product> {
    const product: Product = { id: new ObjectId().toHexString(), ...structuredClone(draft) };
    if (this.products.has(product.id)) {
      throw new DuplicateRecordError('products.insert', `duplicate id ${product.id}`);
    }
    this.products.set(product.id, product);
    return structuredClone(product);
  }

  // Inserts drafts one by one, in order.
  async insertMany(drafts: NewProduct[]): Promise<Product[]> {
    const inserted: Product[] = [];
    for (const draft of drafts) {
      inserted.push(await this.insert(draft));
    }
    return inserted;
  }

  // Merges the patch into the stored product.
  async update(id: string, patch: ProductPatch): Promise<Product | null> {
    const current = this.products.get(id);
    if (!current) return null;
    const next: Product = { ...current, ...structuredClone(patch) };
    this.products.set(id, next);
    return structuredClone(next);
  }

  // Removes a product from the map.
  async delete(id: string): Promise<boolean> {
    return this.products.delete(id);
  }
}
