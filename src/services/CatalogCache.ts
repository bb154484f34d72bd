import { ReadWriteLock } from '../storage/locks';
import { ProductRepository } from '../storage/productRepository';
import { Product } from '../storage/recordTypes';
import { CatalogSeed, DEFAULT_CATALOG } from '../storefront/defaultCatalog';
import { logInfo } from '../logger';

// In-memory mirror of the products collection for listing. The store stays authoritative;
// checkout prices are always read from the store.
export class CatalogCache {
  private products: Product[] = [];
  private lock = new ReadWriteLock();

  constructor(
    private readonly repo: ProductRepository,
    private readonly defaults: readonly CatalogSeed[] = DEFAULT_CATALOG
  ) {}

  // Mirrors the store; an empty store is seeded with the default catalog first.
  load(): Promise<Product[]> {
    return this.lock.write(async () => {
      const existing = await this.repo.list();
      if (existing.length > 0) {
        this.products = existing;
        logInfo('catalog_loaded', { count: existing.length });
        return this.snapshot();
      }
      const now = new Date();
      this.products = await this.repo.insertMany(this.defaults.map(seed => ({ ...seed, createdAt: now })));
      logInfo('catalog_seeded', { count: this.products.length });
      return this.snapshot();
    });
  }

  list(): Promise<Product[]> {
    return this.lock.read(() => this.snapshot());
  }

  // Called after the store write succeeded.
  append(product: Product): Promise<void> {
    return this.lock.write(() => {
      this.products = [...this.products.filter(p => p.id !== product.id), product];
    });
  }

  replace(product: Product): Promise<void> {
    return this.lock.write(() => {
      this.products = this.products.map(p => (p.id === product.id ? product : p));
    });
  }

  remove(id: string): Promise<void> {
    return this.lock.write(() => {
      this.products = this.products.filter(p => p.id !== id);
    });
  }

  private snapshot(): Product[] {
    return [...this.products].sort((a, b) => a.productId - b.productId);
  }
}
