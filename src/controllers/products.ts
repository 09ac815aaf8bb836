import { NextFunction, Request, Response } from "express";
import { getCrmStore } from "../store";
import {
  createProduct as createProductRecord,
  getProduct as findProduct,
  listProducts,
} from "../services/products";

export const getProducts = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const { items, pagination } = await listProducts(getCrmStore(), req.query);
    console.log(`🔍 Found ${items.length} products (total: ${pagination.total})`);
    res.json({ success: true, products: items, pagination });
  } catch (error) {
    next(error);
  }
};

export const getProduct = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const product = await findProduct(getCrmStore(), req.params.id);
    res.json({ success: true, product });
  } catch (error) {
    next(error);
  }
};

export const createProduct = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const payload = await createProductRecord(getCrmStore(), req.body);
    res
      .status(payload.product ? 201 : 200)
      .json({ success: payload.errors.length === 0, ...payload });
  } catch (error) {
    next(error);
  }
};
