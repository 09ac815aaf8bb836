import { CrmStore } from "../store/types";
import { PRODUCT_SORT_FIELDS, buildProductFilter } from "../filters/products";
import { buildPagination, parseOrderBy, toListOptions } from "../filters/listing";
import { AppError, toFieldErrors } from "../utils/errors";
import { parseWith } from "../validation/common";
import { productInputSchema } from "../validation/products";
import { productQuerySchema } from "../validation/queries";
import { ListResult, ProductPayload, ProductRecord } from "../types/crm";

export const createProduct = async (
  store: CrmStore,
  input: unknown
): Promise<ProductPayload> => {
  const parsed = parseWith(productInputSchema, input);
  if (!parsed.success) {
    return { product: null, message: "Validation failed", errors: parsed.errors };
  }

  try {
    const product = await store.products.create(parsed.data);
    console.log(`✅ Created product: ${product.name} (${product.price})`);
    return {
      product,
      message: `Product '${product.name}' created successfully`,
      errors: [],
    };
  } catch (error) {
    return {
      product: null,
      message: "Failed to create product",
      errors: toFieldErrors(error, "Failed to create product"),
    };
  }
};

export const listProducts = async (
  store: CrmStore,
  query: unknown
): Promise<ListResult<ProductRecord>> => {
  const parsed = parseWith(productQuerySchema, query);
  if (!parsed.success) {
    throw AppError.validation(parsed.errors);
  }

  const { orderBy, page, limit, ...criteria } = parsed.data;
  const sort = parseOrderBy(orderBy, PRODUCT_SORT_FIELDS, { name: 1 });
  const result = await store.products.find(
    buildProductFilter(criteria),
    toListOptions(sort, page, limit)
  );

  return { items: result.items, pagination: buildPagination(page, limit, result.total) };
};

export const getProduct = (store: CrmStore, id: string): Promise<ProductRecord | null> =>
  store.products.findById(id);
