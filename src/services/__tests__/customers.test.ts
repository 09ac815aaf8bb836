import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryCrmStore } from '../../testing/memoryStore';
import { bulkCreateCustomers, createCustomer, getCustomer, listCustomers } from '../customers';
import { ErrorKind } from '../../utils/errors';

const PHONE_MESSAGE = 'Phone number must be in format: +1234567890 or 123-456-7890';

describe('customer service', () => {
  let store: MemoryCrmStore;

  beforeEach(() => {
    store = new MemoryCrmStore();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createCustomer', () => {
    it('should create a customer', async () => {
      const payload = await createCustomer(store, {
        name: 'Ines Duarte',
        email: 'Ines@Example.com',
        phone: '+351 555 0100',
      });

      expect(payload.errors).toEqual([]);
      expect(payload.message).toBe("Customer 'Ines Duarte' created successfully");
      expect(payload.customer).toMatchObject({
        name: 'Ines Duarte',
        email: 'ines@example.com',
        phone: '+351 555 0100',
      });
    });

    it('should store an empty phone as no phone', async () => {
      const payload = await createCustomer(store, { name: 'Ines Duarte', email: 'ines@example.com', phone: '' });
      expect(payload.customer?.phone).toBeNull();
    });

    it('should accept exactly one of two customers sharing an email', async () => {
      const first = await createCustomer(store, { name: 'Ines Duarte', email: 'ines@example.com' });
      const second = await createCustomer(store, { name: 'Ines D.', email: ' INES@example.com ' });

      expect(first.customer).not.toBeNull();
      expect(second).toEqual({
        customer: null,
        message: 'Validation failed',
        errors: [{ field: 'email', message: 'Email already exists' }],
      });
    });

    it('should report a taken email and a bad phone together', async () => {
      await createCustomer(store, { name: 'Ines Duarte', email: 'ines@example.com' });

      const payload = await createCustomer(store, {
        name: 'Ines Again',
        email: 'ines@example.com',
        phone: '555.0100',
      });

      expect(payload.errors).toEqual([
        { field: 'email', message: 'Email already exists' },
        { field: 'phone', message: PHONE_MESSAGE },
      ]);
    });

    it('should turn a unique index violation into an email error', async () => {
      await createCustomer(store, { name: 'Ines Duarte', email: 'ines@example.com' });
      // Another request inserted the same email between the check and the insert
      vi.spyOn(store.customers, 'existsByEmail').mockResolvedValue(false);

      const payload = await createCustomer(store, { name: 'Ines Again', email: 'ines@example.com' });

      expect(payload).toEqual({
        customer: null,
        message: 'Failed to create customer',
        errors: [{ field: 'email', message: 'Email already exists' }],
      });
    });

    it('should not leak the text of unexpected failures', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(store.customers, 'create').mockRejectedValueOnce(new Error('connection reset by peer'));

      const payload = await createCustomer(store, { name: 'Ines Duarte', email: 'ines@example.com' });

      expect(payload).toEqual({
        customer: null,
        message: 'Failed to create customer',
        errors: [{ field: 'general', message: 'An unexpected error occurred' }],
      });
      expect(consoleError).toHaveBeenCalledTimes(1);
    });
  });

  describe('bulkCreateCustomers', () => {
    it('should commit the valid rows and report the duplicate by index', async () => {
      const payload = await bulkCreateCustomers(store, [
        { name: 'Row One', email: 'one@example.com' },
        { name: 'Row Two', email: 'one@example.com' },
        { name: 'Row Three', email: 'three@example.com' },
      ]);

      expect(payload.customers.map((customer) => customer.email)).toEqual([
        'one@example.com',
        'three@example.com',
      ]);
      expect(payload.errors).toEqual([
        { index: 1, errors: [{ field: 'email', message: 'Email already exists' }] },
      ]);
      expect(payload.message).toBe('Created 2 of 3 customers');
      expect(await store.customers.existsByEmail('three@example.com')).toBe(true);
      expect(store.transactions).toBe(0);
    });

    it('should keep going after rows with invalid fields', async () => {
      const payload = await bulkCreateCustomers(store, [
        { name: 'No Email' },
        { name: 'Bad Phone', email: 'phone@example.com', phone: 'ring me' },
        { name: 'Fine', email: 'fine@example.com' },
      ]);

      expect(payload.customers).toHaveLength(1);
      expect(payload.errors).toEqual([
        { index: 0, errors: [{ field: 'email', message: 'This field is required' }] },
        { index: 1, errors: [{ field: 'phone', message: PHONE_MESSAGE }] },
      ]);
    });

    it('should keep earlier rows when a later insert fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const create = vi.spyOn(store.customers, 'create');
      create.mockRejectedValueOnce(new Error('write concern timeout'));

      const payload = await bulkCreateCustomers(store, [
        { name: 'Unlucky', email: 'unlucky@example.com' },
        { name: 'Lucky', email: 'lucky@example.com' },
      ]);

      expect(payload.customers.map((customer) => customer.name)).toEqual(['Lucky']);
      expect(payload.errors).toEqual([
        { index: 0, errors: [{ field: 'general', message: 'An unexpected error occurred' }] },
      ]);
    });

    it('should reject input that is not a list', async () => {
      await expect(bulkCreateCustomers(store, { name: 'Solo' })).rejects.toMatchObject({
        kind: ErrorKind.Validation,
        fieldErrors: [{ field: 'input', message: 'Expected a list of customers' }],
      });
    });
  });

  describe('listCustomers', () => {
    beforeEach(async () => {
      await bulkCreateCustomers(store, [
        { name: 'Anna Berg', email: 'anna@example.com' },
        { name: 'Hannah Cole', email: 'hannah@example.com' },
        { name: 'Joanna Dunn', email: 'joanna@example.com' },
      ]);
    });

    it('should pass the composed filter, sort and page to the store', async () => {
      const result = await listCustomers(store, {
        nameIcontains: 'ann',
        orderBy: '-createdAt',
        page: '2',
        limit: '1',
      });

      expect(store.customers.queries).toEqual([
        {
          filter: { $and: [{ name: { $regex: 'ann', $options: 'i' } }] },
          options: { sort: { createdAt: -1, _id: 1 }, skip: 1, limit: 1 },
        },
      ]);
      expect(result.items.map((customer) => customer.name)).toEqual(['Hannah Cole']);
      expect(result.pagination).toEqual({ page: 2, limit: 1, total: 3, pages: 3 });
    });

    it('should match names and emails case-insensitively and literally', async () => {
      await store.customers.create({ name: 'ANNA LUND', email: 'anna.lund@example.com' });
      await store.customers.create({ name: 'Ann Axe', email: 'annaxlund@example.com' });

      const byName = await listCustomers(store, { nameIcontains: 'AnNa' });
      expect(byName.items.map((customer) => customer.name)).toEqual([
        'ANNA LUND',
        'Anna Berg',
        'Hannah Cole',
        'Joanna Dunn',
      ]);

      const byEmail = await listCustomers(store, { emailIcontains: 'a.lund' });
      expect(byEmail.items.map((customer) => customer.email)).toEqual(['anna.lund@example.com']);
    });

    it('should match a phone prefix literally and case-sensitively', async () => {
      await store.customers.create({ name: 'Plus One', email: 'plus@example.com', phone: '+1 555-0100' });
      await store.customers.create({ name: 'One Plus', email: 'one@example.com', phone: '1+555-0100' });
      await store.customers.create({ name: 'Ext', email: 'ext@example.com', phone: 'X12' });

      const plus = await listCustomers(store, { phonePattern: '+1' });
      expect(plus.items.map((customer) => customer.name)).toEqual(['Plus One']);

      const lower = await listCustomers(store, { phonePattern: 'x' });
      expect(lower.items).toEqual([]);
    });

    it('should combine a date range with other criteria', async () => {
      store.clock = () => new Date('2030-01-15T09:00:00Z');
      await store.customers.create({ name: 'Anneli Late', email: 'anneli@example.com' });

      const result = await listCustomers(store, {
        nameIcontains: 'ann',
        createdAtGte: '2030-01-15',
        createdAtLte: '2030-01-15',
      });

      expect(result.items.map((customer) => customer.name)).toEqual(['Anneli Late']);
    });

    it('should order by name by default', async () => {
      await listCustomers(store, {});
      expect(store.customers.queries[0].options.sort).toEqual({ name: 1, _id: 1 });
    });

    it('should reject an unknown sort field', async () => {
      await expect(listCustomers(store, { orderBy: 'password' })).rejects.toMatchObject({
        kind: ErrorKind.Validation,
        fieldErrors: [{ field: 'orderBy' }],
      });
    });
  });

  it('getCustomer should return null for an unknown id', async () => {
    expect(await getCustomer(store, '65f1c0ffee00000000000999')).toBeNull();
  });
});
