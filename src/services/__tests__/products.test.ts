import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryCrmStore } from '../../testing/memoryStore';
import { createProduct, getProduct, listProducts } from '../products';
import { ErrorKind } from '../../utils/errors';

describe('product service', () => {
  let store: MemoryCrmStore;

  beforeEach(() => {
    store = new MemoryCrmStore();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createProduct', () => {
    it('should create a product with a two-place price', async () => {
      const payload = await createProduct(store, { name: 'Laptop Stand', price: '999.99', stock: 4 });

      expect(payload.errors).toEqual([]);
      expect(payload.message).toBe("Product 'Laptop Stand' created successfully");
      expect(payload.product).toMatchObject({ name: 'Laptop Stand', price: '999.99', stock: 4 });
      expect(await getProduct(store, payload.product?.id ?? '')).toEqual(payload.product);
    });

    it.each([0, -1, '0.00', '-12.50'])('should refuse a price of %s and create nothing', async (price) => {
      const create = vi.spyOn(store.products, 'create');

      const payload = await createProduct(store, { name: 'Freebie', price });

      expect(payload).toEqual({
        product: null,
        message: 'Validation failed',
        errors: [{ field: 'price', message: 'Price must be positive' }],
      });
      expect(create).not.toHaveBeenCalled();
    });

    it('should refuse a negative stock', async () => {
      const payload = await createProduct(store, { name: 'Backorder', price: 5, stock: -2 });
      expect(payload.errors).toEqual([{ field: 'stock', message: 'Stock cannot be negative' }]);
    });
  });

  describe('listProducts', () => {
    it('should filter low stock below ten', async () => {
      await listProducts(store, { lowStock: 'true' });

      expect(store.products.queries).toEqual([
        {
          filter: { $and: [{ stock: { $lt: 10 } }] },
          options: { sort: { name: 1, _id: 1 }, skip: 0, limit: 50 },
        },
      ]);
    });

    it('should treat lowStock=false as no constraint', async () => {
      await listProducts(store, { lowStock: 'false' });
      expect(store.products.queries[0].filter).toEqual({});
    });

    it('should sort by price descending', async () => {
      await listProducts(store, { orderBy: '-price', priceLte: '100' });

      expect(store.products.queries[0]).toEqual({
        filter: { $and: [{ price: { $lte: 100 } }] },
        options: { sort: { price: -1, _id: 1 }, skip: 0, limit: 50 },
      });
    });

    describe('against stored products', () => {
      beforeEach(async () => {
        await store.products.create({ name: 'Ink Nine', price: '9.00', stock: 9 });
        await store.products.create({ name: 'Ink Ten', price: '10.00', stock: 10 });
        await store.products.create({ name: 'Paper Eleven', price: '11.00', stock: 11 });
        await store.products.create({ name: 'Paper Zero', price: '0.50', stock: 0 });
      });

      const names = (result: { items: Array<{ name: string }> }): string[] =>
        result.items.map((product) => product.name);

      it('should return stock below ten and never stock of exactly ten', async () => {
        expect(names(await listProducts(store, { lowStock: 'true' }))).toEqual(['Ink Nine', 'Paper Zero']);
      });

      it('should combine criteria as AND', async () => {
        const result = await listProducts(store, { lowStock: '1', nameIcontains: 'paper' });
        expect(names(result)).toEqual(['Paper Zero']);
      });

      it('should include both ends of a price range', async () => {
        const result = await listProducts(store, { priceGte: '9', priceLte: '10', orderBy: '-price' });
        expect(names(result)).toEqual(['Ink Ten', 'Ink Nine']);
      });

      it('should match an exact stock of zero', async () => {
        expect(names(await listProducts(store, { stock: '0' }))).toEqual(['Paper Zero']);
      });
    });

    it('should reject a non-numeric bound', async () => {
      await expect(listProducts(store, { priceGte: 'cheap' })).rejects.toMatchObject({
        kind: ErrorKind.Validation,
        fieldErrors: [{ field: 'priceGte', message: 'Enter a number' }],
      });
    });
  });
});
