import { errorResponses, idParams, openObject } from '@backoffice/shared/src/http/schemas';

const stockMutationResponse = {
     type: 'object',
     properties: { stock: openObject, movement: openObject },
};

export const createProductSchema = {
     tags: ['products'],
     summary: 'Create a product with its empty stock row',
     body: {
          type: 'object',
          required: ['sku', 'name'],
          properties: {
               sku: { type: 'string', minLength: 1, maxLength: 64, example: 'TSHIRT-BLUE-M' },
               name: { type: 'string', minLength: 1, maxLength: 200 },
               minQuantity: { type: 'integer', minimum: 0 },
               maxQuantity: { type: 'integer', minimum: 0 },
               reorderQuantity: { type: 'integer', minimum: 0 },
               autoReorder: { type: 'boolean' },
          },
     },
     response: {
          201: { type: 'object', properties: { product: openObject, stock: openObject } },
          ...errorResponses(400, 409, 500),
     },
};

export const getProductSchema = {
     tags: ['products'],
     summary: 'Get a product and its stock',
     params: idParams('productId'),
     response: {
          200: { type: 'object', properties: { product: openObject, stock: openObject } },
          ...errorResponses(404, 500),
     },
};

export const getStockSchema = {
     tags: ['stock'],
     summary: 'Current, reserved and available quantity of a product',
     params: idParams('productId'),
     response: { 200: openObject, ...errorResponses(404, 500) },
};

export const addStockSchema = {
     tags: ['stock'],
     summary: 'Receive units into stock',
     params: idParams('productId'),
     body: {
          type: 'object',
          required: ['quantity'],
          properties: {
               quantity: { type: 'integer', minimum: 1 },
               reason: { type: 'string', maxLength: 500 },
          },
     },
     response: { 200: stockMutationResponse, ...errorResponses(400, 404, 500) },
};

export const removeStockSchema = {
     tags: ['stock'],
     summary: 'Take unreserved units out of stock',
     params: idParams('productId'),
     body: addStockSchema.body,
     response: { 200: stockMutationResponse, ...errorResponses(400, 404, 409, 500) },
};

export const adjustStockSchema = {
     tags: ['stock'],
     summary: 'Set stock to a counted quantity',
     params: idParams('productId'),
     body: {
          type: 'object',
          required: ['newQuantity', 'category', 'reason'],
          properties: {
               newQuantity: { type: 'integer', minimum: 0 },
               category: { type: 'string', enum: ['manual_correction', 'stocktake'] },
               reason: { type: 'string', minLength: 1, maxLength: 500 },
          },
     },
     response: { 200: stockMutationResponse, ...errorResponses(400, 404, 409, 500) },
};

export const setThresholdsSchema = {
     tags: ['stock'],
     summary: 'Update stock thresholds',
     params: idParams('productId'),
     body: {
          type: 'object',
          required: ['minQuantity', 'maxQuantity', 'reorderQuantity'],
          properties: {
               minQuantity: { type: 'integer', minimum: 0 },
               maxQuantity: { type: 'integer', minimum: 0 },
               reorderQuantity: { type: 'integer', minimum: 0 },
               autoReorder: { type: 'boolean' },
          },
     },
     response: { 200: openObject, ...errorResponses(400, 404, 500) },
};

export const setDiscontinuedSchema = {
     tags: ['stock'],
     summary: 'Pin or unpin the discontinued status',
     params: idParams('productId'),
     body: {
          type: 'object',
          required: ['discontinued'],
          properties: { discontinued: { type: 'boolean' } },
     },
     response: { 200: openObject, ...errorResponses(400, 404, 500) },
};

export const verifyLedgerSchema = {
     tags: ['stock'],
     summary: 'Replay the movements of a product against its current quantity',
     params: idParams('productId'),
     response: {
          200: {
               type: 'object',
               properties: {
                    productId: { type: 'integer' },
                    movementCount: { type: 'integer' },
                    replayedQuantity: { type: 'integer' },
                    currentQuantity: { type: 'integer' },
                    consistent: { type: 'boolean' },
                    brokenMovementIds: { type: 'array', items: { type: 'integer' } },
               },
          },
          ...errorResponses(404, 500),
     },
};

export const listMovementsSchema = {
     tags: ['movements'],
     summary: 'Query the movement ledger, newest first',
     querystring: {
          type: 'object',
          properties: {
               productId: { type: 'integer', minimum: 1 },
               actor: { type: 'string', minLength: 1 },
               from: { type: 'string', format: 'date-time' },
               to: { type: 'string', format: 'date-time' },
               limit: { type: 'integer', minimum: 1, maximum: 500, default: 100 },
               offset: { type: 'integer', minimum: 0, default: 0 },
          },
     },
     response: { 200: { type: 'array', items: openObject }, ...errorResponses(400, 500) },
};

export const checkStockLevelsSchema = {
     tags: ['alerts'],
     summary: 'Raise and resolve stock alerts',
     body: {
          type: 'object',
          properties: { dryRun: { type: 'boolean', default: false } },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    dryRun: { type: 'boolean' },
                    checkedProducts: { type: 'integer' },
                    raised: { type: 'array', items: openObject },
                    resolvedAlertIds: { type: 'array', items: { type: 'integer' } },
               },
          },
          ...errorResponses(400, 500),
     },
};

export const listAlertsSchema = {
     tags: ['alerts'],
     summary: 'Active stock alerts',
     response: { 200: { type: 'array', items: openObject }, ...errorResponses(500) },
};
