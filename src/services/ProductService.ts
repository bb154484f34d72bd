import { InvalidInputError, NotFoundError } from '../errors/httpError';
import { logInfo } from '../logger';
import { ProductRepository } from '../storage/productRepository';
import { Product, ProductPatch, isRecordId } from '../storage/recordTypes';
import { DEFAULT_PRODUCT_IMAGE } from '../storefront/defaultCatalog';
import { CreateProductInput, UpdateProductInput } from '../storefront/schemas';
import { CatalogCache } from './CatalogCache';
import { SequenceGenerator } from './SequenceGenerator';

function parseRecordId(id: string): string {
  if (!isRecordId(id)) {
    throw new InvalidInputError('Invalid product ID format');
  }
  return id.toLowerCase();
}

// Catalog reads and operator-side product administration. Writes go to the store first,
// then to the cache.
export class ProductService {
  constructor(
    private readonly repo: ProductRepository,
    private readonly cache: CatalogCache,
    private readonly sequence: SequenceGenerator
  ) {}

  list(): Promise<Product[]> {
    return this.cache.list();
  }

  // Accepts a record identity or a numeric productId; always answered by the store.
  // An all-digit record identity is tried as an identity first.
  async get(idOrProductId: string): Promise<Product> {
    let product: Product | null = null;
    if (isRecordId(idOrProductId)) {
      product = await this.repo.findById(idOrProductId.toLowerCase());
    }
    if (!product && /^\d+$/.test(idOrProductId)) {
      product = await this.repo.findByProductId(Number(idOrProductId));
    }
    if (!product) {
      throw new NotFoundError('Product not found');
    }
    return product;
  }

  async create(input: CreateProductInput): Promise<Product> {
    const product = await this.sequence.assign('product', productId =>
      this.repo.insert({
        productId,
        name: input.name,
        description: input.description,
        price: input.price,
        image: input.image ?? DEFAULT_PRODUCT_IMAGE,
        category: input.category,
        createdAt: new Date(),
      })
    );
    await this.cache.append(product);
    logInfo('product_created', { id: product.id, productId: product.productId });
    return product;
  }

  async update(id: string, input: UpdateProductInput): Promise<Product> {
    const recordId = parseRecordId(id);
    const patch: ProductPatch = {};
    if (input.name !== undefined) patch.name = input.name;
    if (input.description !== undefined) patch.description = input.description;
    if (input.price !== undefined) patch.price = input.price;
    if (input.image !== undefined) patch.image = input.image;
    if (input.category !== undefined) patch.category = input.category;

    const updated = await this.repo.update(recordId, patch);
    if (!updated) {
      throw new NotFoundError('Product not found');
    }
    await this.cache.replace(updated);
    logInfo('product_updated', { id: updated.id, productId: updated.productId, fields: Object.keys(patch) });
    return updated;
  }

  async delete(id: string): Promise<void> {
    const recordId = parseRecordId(id);
    const removed = await this.repo.delete(recordId);
    if (!removed) {
      throw new NotFoundError('Product not found');
    }
    await this.cache.remove(recordId);
    logInfo('product_deleted', { id: recordId });
  }
}
