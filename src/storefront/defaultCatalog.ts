import { NewProduct } from '../storage/recordTypes';

export type CatalogSeed = Omit<NewProduct, 'createdAt'>;

// Seeds an empty products collection on first boot.
export const DEFAULT_CATALOG: readonly CatalogSeed[] = [
  { productId: 1, name: 'Chocolate Chip Cookies', description: 'Freshly baked cookies with premium chocolate chips', price: 8.99, image: '🍪', category: 'Cookies' },
  { productId: 2, name: 'Blueberry Muffins', description: 'Moist muffins bursting with fresh blueberries', price: 6.99, image: '🧁', category: 'Muffins' },
  { productId: 3, name: 'Croissant', description: 'Buttery, flaky French croissant', price: 4.99, image: '🥐', category: 'Pastries' },
  { productId: 4, name: 'Chocolate Cake', description: 'Rich chocolate layer cake with buttercream frosting', price: 24.99, image: '🎂', category: 'Cakes' },
  { productId: 5, name: 'Apple Pie', description: 'Homemade apple pie with cinnamon', price: 18.99, image: '🥧', category: 'Pies' },
  { productId: 6, name: 'Bagels', description: 'Fresh New York style bagels (pack of 6)', price: 7.99, image: '🥯', category: 'Breads' },
  { productId: 7, name: 'Cinnamon Roll', description: 'Warm cinnamon rolls with cream cheese glaze', price: 5.99, image: '🍩', category: 'Pastries' },
  { productId: 8, name: 'Strawberry Tart', description: 'Delicate tart with fresh strawberries', price: 12.99, image: '🍓', category: 'Tarts' },
];

export const DEFAULT_PRODUCT_IMAGE = '/images/default.png';
