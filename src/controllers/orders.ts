import { NextFunction, Request, Response } from "express";
import { getCrmStore } from "../store";
import {
  createOrder as createOrderRecord,
  getOrder as findOrder,
  listOrders,
  recalculateOrderTotal,
} from "../services/orders";

export const getOrders = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const { items, pagination } = await listOrders(getCrmStore(), req.query);
    console.log(`🔍 Found ${items.length} orders (total: ${pagination.total})`);
    res.json({ success: true, orders: items, pagination });
  } catch (error) {
    next(error);
  }
};

export const getOrder = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const order = await findOrder(getCrmStore(), req.params.id);
    res.json({ success: true, order });
  } catch (error) {
    next(error);
  }
};

export const createOrder = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const payload = await createOrderRecord(getCrmStore(), req.body);
    res
      .status(payload.order ? 201 : 200)
      .json({ success: payload.errors.length === 0, ...payload });
  } catch (error) {
    next(error);
  }
};

export const recalculateTotal = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const payload = await recalculateOrderTotal(getCrmStore(), req.params.id);
    res.json({ success: payload.errors.length === 0, ...payload });
  } catch (error) {
    next(error);
  }
};
