import express from 'express';
import {
  getOrders,
  getOrder,
  createOrder,
  recalculateTotal
} from '../controllers/orders';

const router = express.Router();

router.get('/', getOrders);
router.post('/', createOrder);
router.get('/:id', getOrder);
router.post('/:id/recalculate-total', recalculateTotal);

export default router;
