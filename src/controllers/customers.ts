import { NextFunction, Request, Response } from "express";
import { getCrmStore } from "../store";
import {
  bulkCreateCustomers,
  createCustomer as createCustomerRecord,
  getCustomer as findCustomer,
  listCustomers,
} from "../services/customers";

export const getCustomers = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const { items, pagination } = await listCustomers(getCrmStore(), req.query);
    console.log(`🔍 Found ${items.length} customers (total: ${pagination.total})`);
    res.json({ success: true, customers: items, pagination });
  } catch (error) {
    next(error);
  }
};

// Unknown ids answer with customer: null rather than a 404
export const getCustomer = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const customer = await findCustomer(getCrmStore(), req.params.id);
    res.json({ success: true, customer });
  } catch (error) {
    next(error);
  }
};

export const createCustomer = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const payload = await createCustomerRecord(getCrmStore(), req.body);
    res
      .status(payload.customer ? 201 : 200)
      .json({ success: payload.errors.length === 0, ...payload });
  } catch (error) {
    next(error);
  }
};

export const bulkCreate = async (
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> => {
  try {
    const payload = await bulkCreateCustomers(getCrmStore(), req.body);
    res
      .status(payload.customers.length > 0 ? 201 : 200)
      .json({ success: payload.errors.length === 0, ...payload });
  } catch (error) {
    next(error);
  }
};
