import express from 'express';
import {
  getCustomers,
  getCustomer,
  createCustomer,
  bulkCreate
} from '../controllers/customers';

const router = express.Router();

router.get('/', getCustomers);
router.post('/', createCustomer);
router.post('/bulk', bulkCreate);
router.get('/:id', getCustomer);

export default router;
