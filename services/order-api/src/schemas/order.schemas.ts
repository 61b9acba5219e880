import { errorResponses, idParams, openObject } from '@backoffice/shared/src/http/schemas';

const PAYMENT_METHODS = ['mobile_money', 'card', 'cash_on_delivery'];
const REFUND_REASONS = [
     'customer_request',
     'defective_product',
     'wrong_item',
     'late_delivery',
     'order_cancelled',
     'other',
];

export const createOrderSchema = {
     tags: ['orders'],
     summary: 'Create an order',
     description:
          'Reserves stock for every line and records the order with an initiated payment. Nothing is reserved if any line is short.',
     body: {
          type: 'object',
          required: ['customerId', 'paymentMethod', 'deliveryAddress', 'lines'],
          properties: {
               customerId: { type: 'string', minLength: 1, example: 'customer-42' },
               paymentMethod: { type: 'string', enum: PAYMENT_METHODS },
               deliveryFee: { type: 'integer', minimum: 0, default: 0 },
               deliveryAddress: {
                    type: 'object',
                    required: ['recipient', 'phone', 'line1', 'city'],
                    properties: {
                         recipient: { type: 'string', minLength: 1 },
                         phone: { type: 'string', minLength: 1 },
                         line1: { type: 'string', minLength: 1 },
                         city: { type: 'string', minLength: 1 },
                         notes: { type: 'string' },
                    },
               },
               lines: {
                    type: 'array',
                    minItems: 1,
                    items: {
                         type: 'object',
                         required: ['productId', 'quantity', 'unitPrice'],
                         properties: {
                              productId: { type: 'integer', minimum: 1 },
                              quantity: { type: 'integer', minimum: 1 },
                              unitPrice: { type: 'integer', minimum: 0 },
                         },
                    },
               },
          },
     },
     response: {
          201: {
               description: 'Order created',
               type: 'object',
               properties: { order: openObject, payment: openObject },
          },
          ...errorResponses(400, 404, 409, 500),
     },
};

export const getOrderSchema = {
     tags: ['orders'],
     summary: 'Get an order with its items',
     params: idParams('orderId'),
     response: { 200: openObject, ...errorResponses(404, 500) },
};

export const getOrderByNumberSchema = {
     tags: ['orders'],
     summary: 'Get an order by its CMD-YYYY-MM-NNNN number',
     params: {
          type: 'object',
          required: ['orderNumber'],
          properties: { orderNumber: { type: 'string', pattern: '^CMD-\\d{4}-\\d{2}-\\d{4,}$' } },
     },
     response: { 200: openObject, ...errorResponses(400, 404, 500) },
};

export const orderTransitionSchema = {
     tags: ['orders'],
     summary: 'Move an order along its lifecycle',
     params: idParams('orderId'),
     response: { 200: openObject, ...errorResponses(404, 409, 500) },
};

export const cancelOrderSchema = {
     tags: ['orders'],
     summary: 'Cancel a pending or paid order',
     description:
          'Pending orders release their reservations. Paid orders get compensating return movements and a refund request. Cancelling twice is a no-op.',
     params: idParams('orderId'),
     body: {
          type: 'object',
          properties: { reason: { type: 'string', maxLength: 500 } },
     },
     response: {
          200: { type: 'object', properties: { order: openObject, refund: { ...openObject, nullable: true } } },
          ...errorResponses(404, 409, 500),
     },
};

export const returnOrderSchema = {
     tags: ['orders'],
     summary: 'Record the return of a delivered order',
     params: idParams('orderId'),
     body: {
          type: 'object',
          properties: {
               reason: { type: 'string', enum: REFUND_REASONS },
               description: { type: 'string', maxLength: 1000 },
               amount: { type: 'integer', minimum: 1 },
          },
     },
     response: {
          200: { type: 'object', properties: { order: openObject, refund: openObject } },
          ...errorResponses(400, 404, 409, 500),
     },
};

export const listPaymentsSchema = {
     tags: ['payments'],
     summary: 'List the payment attempts of an order',
     params: idParams('orderId'),
     response: { 200: { type: 'array', items: openObject }, ...errorResponses(404, 500) },
};

export const createPaymentSchema = {
     tags: ['payments'],
     summary: 'Start a new payment attempt after a failed one',
     params: idParams('orderId'),
     response: { 201: openObject, ...errorResponses(404, 409, 500) },
};

export const getPaymentSchema = {
     tags: ['payments'],
     summary: 'Get a payment',
     params: idParams('paymentId'),
     response: { 200: openObject, ...errorResponses(404, 500) },
};

export const authorizePaymentSchema = {
     tags: ['payments'],
     summary: 'Record a gateway authorization',
     params: idParams('paymentId'),
     body: {
          type: 'object',
          properties: { gatewayReference: { type: 'string', maxLength: 200 } },
     },
     response: { 200: openObject, ...errorResponses(404, 409, 500) },
};

export const capturePaymentSchema = {
     tags: ['payments'],
     summary: 'Gateway capture callback',
     description:
          'A success captures the payment, marks the order paid and commits its reservations in one transaction. A failure fails the payment.',
     params: idParams('paymentId'),
     body: {
          type: 'object',
          required: ['result'],
          properties: {
               result: { type: 'string', enum: ['success', 'failure'] },
               reference: { type: 'string', maxLength: 200 },
               reason: { type: 'string', maxLength: 500 },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    status: { type: 'string', enum: ['OK', 'FAILED'] },
                    payment: openObject,
                    order: openObject,
                    reason: { type: 'string' },
               },
          },
          ...errorResponses(400, 404, 409, 500),
     },
};

export const confirmCashSchema = {
     tags: ['payments'],
     summary: 'Confirm cash collected on delivery',
     params: idParams('paymentId'),
     body: {
          type: 'object',
          properties: { cashReceived: { type: 'integer', minimum: 0 } },
     },
     response: capturePaymentSchema.response,
};

export const requestRefundSchema = {
     tags: ['refunds'],
     summary: 'Request a refund for a cancelled or returned order',
     body: {
          type: 'object',
          required: ['orderId', 'reason'],
          properties: {
               orderId: { type: 'integer', minimum: 1 },
               reason: { type: 'string', enum: REFUND_REASONS },
               amount: { type: 'integer', minimum: 1 },
               description: { type: 'string', maxLength: 1000 },
          },
     },
     response: { 201: openObject, ...errorResponses(400, 404, 409, 500) },
};

export const getRefundSchema = {
     tags: ['refunds'],
     summary: 'Get a refund',
     params: idParams('refundId'),
     response: { 200: openObject, ...errorResponses(404, 500) },
};

export const refundTransitionSchema = {
     tags: ['refunds'],
     summary: 'Move a refund along its workflow',
     params: idParams('refundId'),
     response: { 200: openObject, ...errorResponses(404, 409, 500) },
};

export const failRefundSchema = {
     tags: ['refunds'],
     summary: 'Mark a refund as failed',
     params: idParams('refundId'),
     body: {
          type: 'object',
          required: ['reason'],
          properties: { reason: { type: 'string', minLength: 1, maxLength: 500 } },
     },
     response: { 200: openObject, ...errorResponses(400, 404, 409, 500) },
};

export const reserveSchema = {
     tags: ['reservations'],
     summary: 'Reserve stock against an order reference',
     body: {
          type: 'object',
          required: ['productId', 'quantity', 'orderRef'],
          properties: {
               productId: { type: 'integer', minimum: 1 },
               quantity: { type: 'integer', minimum: 1 },
               orderRef: { type: 'string', minLength: 1, maxLength: 64 },
          },
     },
     response: { 201: openObject, ...errorResponses(400, 404, 409, 500) },
};

export const releaseReservationSchema = {
     tags: ['reservations'],
     summary: 'Release a reservation',
     description: 'Idempotent: unknown or already closed reservations return released=false.',
     params: idParams('reservationId'),
     response: {
          200: {
               type: 'object',
               properties: { released: { type: 'boolean' }, reservation: { ...openObject, nullable: true } },
          },
          ...errorResponses(500),
     },
};

export const commitReservationSchema = {
     tags: ['reservations'],
     summary: 'Commit a reservation into an outbound movement',
     params: idParams('reservationId'),
     response: {
          200: {
               type: 'object',
               properties: { reservation: openObject, movement: openObject, stock: openObject },
          },
          ...errorResponses(404, 500),
     },
};
