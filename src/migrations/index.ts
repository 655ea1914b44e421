import { CreateOutbox1760712594000 } from './1760712594000-CreateOutbox';
import { CreateOrderSchema1760715896000 } from './1760715896000-CreateOrderSchema';

// Applied in this order
export const MIGRATIONS = [CreateOutbox1760712594000, CreateOrderSchema1760715896000];
