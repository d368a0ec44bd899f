import { deriveEvent, outputHandler } from '../../src/index.js';
import type { Event } from '../../src/index.js';

interface OrderCreated {
  order_id: string;
  amount: number;
}

function isOrderCreated(data: unknown): data is OrderCreated {
  if (data === null || typeof data !== 'object') return false;
  return typeof Reflect.get(data, 'order_id') === 'string' && typeof Reflect.get(data, 'amount') === 'number';
}

/**
 * order.created → order.processed; any other type produces nothing.
 */
export const processOrder = outputHandler((event: Event) => {
  if (event.type !== 'order.created') return null;
  if (!isOrderCreated(event.data)) {
    throw new Error(`Malformed order payload in event ${event.id}`);
  }

  return deriveEvent(event, {
    id: `processed-${event.id}`,
    type: 'order.processed',
    datacontenttype: 'application/json',
    data: { order_id: event.data.order_id, amount: event.data.amount, status: 'processed' },
  });
});
