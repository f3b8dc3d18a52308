/**
 * OpenAPI Document
 * Describes the versioned HTTP API for the Swagger UI route
 */

import {
  OpenApiBuilder,
  type OpenAPIObject,
  type OperationObject,
  type ParameterObject,
  type ReferenceObject,
  type RequestBodyObject,
  type ResponseObject,
  type SchemaObject,
} from 'openapi3-ts/oas31';

import { MAX_SERVICE_PRICE } from '../services/subscription.service.js';

import { API_VERSION } from './routes/health.js';
import { ERROR_STATUS_MAP } from './types.js';

const BASE_PATH = `/api/${API_VERSION}`;

function ref(
  kind: 'schemas' | 'responses' | 'parameters',
  name: string
): ReferenceObject {
  return { $ref: `#/components/${kind}/${name}` };
}

/**
 * Wrap a data schema in the { data, meta } success envelope
 */
function envelope(data: SchemaObject | ReferenceObject): SchemaObject {
  return {
    type: 'object',
    required: ['data', 'meta'],
    properties: {
      data,
      meta: ref('schemas', 'Meta'),
    },
  };
}

function jsonResponse(
  description: string,
  schema: SchemaObject | ReferenceObject
): ResponseObject {
  return {
    description,
    content: { 'application/json': { schema } },
  };
}

function monthParameter(
  name: 'from' | 'to',
  description: string
): ParameterObject {
  return {
    name,
    in: 'query',
    required: true,
    description,
    schema: {
      type: 'string',
      pattern: '^(0[1-9]|1[0-2])-\\d{4}$',
      example: '01-2025',
    },
  };
}

const subscriptionBody: RequestBodyObject = {
  required: true,
  content: {
    'application/json': { schema: ref('schemas', 'SubscriptionInput') },
  },
};

// ─────────────────────────────────────────────────────────────
// OPERATIONS
// ─────────────────────────────────────────────────────────────

const createSubscription: OperationObject = {
  operationId: 'createSubscription',
  tags: ['subscriptions'],
  summary: 'Create a subscription',
  description: 'startedAt is set to the time the request is processed.',
  requestBody: subscriptionBody,
  responses: {
    '201': jsonResponse(
      'Created subscription',
      envelope(ref('schemas', 'Subscription'))
    ),
    '400': ref('responses', 'ValidationError'),
    '500': ref('responses', 'StorageError'),
  },
};

const listSubscriptions: OperationObject = {
  operationId: 'listSubscriptions',
  tags: ['subscriptions'],
  summary: 'List subscriptions',
  description: 'All subscriptions, or only those owned by userId when given.',
  parameters: [
    {
      name: 'userId',
      in: 'query',
      required: false,
      schema: { type: 'string', format: 'uuid' },
    },
  ],
  responses: {
    '200': jsonResponse(
      'Subscriptions ordered by startedAt, then id',
      envelope({ type: 'array', items: ref('schemas', 'Subscription') })
    ),
    '400': ref('responses', 'ValidationError'),
    '500': ref('responses', 'StorageError'),
  },
};

const getTotalCost: OperationObject = {
  operationId: 'getTotalCost',
  tags: ['subscriptions'],
  summary: 'Total cost of a service over a period',
  description:
    'Sums servicePrice over the user\'s subscriptions to serviceName whose ' +
    'startedAt falls between the first instant of `from` and the last ' +
    'second of `to` (UTC, inclusive).',
  parameters: [
    {
      name: 'userId',
      in: 'query',
      required: true,
      schema: { type: 'string', format: 'uuid' },
    },
    {
      name: 'serviceName',
      in: 'query',
      required: true,
      schema: { type: 'string' },
    },
    monthParameter('from', 'First month, MM-YYYY'),
    monthParameter('to', 'Last month, MM-YYYY'),
  ],
  responses: {
    '200': jsonResponse(
      'Total cost in minor currency units',
      envelope({
        type: 'object',
        required: ['totalCost'],
        properties: { totalCost: { type: 'integer', minimum: 0 } },
      })
    ),
    '400': ref('responses', 'ValidationError'),
    '500': ref('responses', 'StorageError'),
  },
};

const getSubscription: OperationObject = {
  operationId: 'getSubscription',
  tags: ['subscriptions'],
  summary: 'Get a subscription',
  parameters: [ref('parameters', 'SubscriptionId')],
  responses: {
    '200': jsonResponse('Subscription', envelope(ref('schemas', 'Subscription'))),
    '400': ref('responses', 'ValidationError'),
    '404': ref('responses', 'NotFound'),
    '500': ref('responses', 'StorageError'),
  },
};

const updateSubscription: OperationObject = {
  operationId: 'updateSubscription',
  tags: ['subscriptions'],
  summary: 'Update a subscription',
  description:
    'Replaces serviceName, servicePrice and endedAt when the subscription ' +
    'is owned by userId. A subscription owned by someone else is left as is.',
  parameters: [ref('parameters', 'SubscriptionId')],
  requestBody: subscriptionBody,
  responses: {
    '200': jsonResponse(
      'Update applied',
      envelope({
        type: 'object',
        required: ['id'],
        properties: { id: { type: 'string', format: 'uuid' } },
      })
    ),
    '400': ref('responses', 'ValidationError'),
    '500': ref('responses', 'StorageError'),
  },
};

const deleteSubscription: OperationObject = {
  operationId: 'deleteSubscription',
  tags: ['subscriptions'],
  summary: 'Delete a subscription',
  description: 'Deletes only when the subscription is owned by userId.',
  parameters: [
    ref('parameters', 'SubscriptionId'),
    {
      name: 'userId',
      in: 'query',
      required: true,
      schema: { type: 'string', format: 'uuid' },
    },
  ],
  responses: {
    '204': { description: 'Deleted, or nothing matched' },
    '400': ref('responses', 'ValidationError'),
    '500': ref('responses', 'StorageError'),
  },
};

const getHealth: OperationObject = {
  operationId: 'getHealth',
  tags: ['health'],
  summary: 'Liveness check',
  responses: {
    '200': jsonResponse('Service is up', {
      type: 'object',
      required: ['status', 'timestamp', 'uptimeSeconds', 'version'],
      properties: {
        status: { type: 'string', const: 'ok' },
        timestamp: { type: 'string', format: 'date-time' },
        uptimeSeconds: { type: 'integer', minimum: 0 },
        version: { type: 'string' },
      },
    }),
  },
};

/**
 * Build the OpenAPI 3.1 document for the API
 */
export function buildOpenApiDocument(): OpenAPIObject {
  const builder = OpenApiBuilder.create({
    openapi: '3.1.0',
    info: {
      title: 'Subscription Cost API',
      version: API_VERSION,
      description:
        'Tracks user subscriptions and reports what a user spent on a ' +
        'service over a range of months. Prices are integer minor units.',
    },
    paths: {},
  });

  builder
    .addSchema('Subscription', {
      type: 'object',
      required: [
        'id',
        'serviceName',
        'servicePrice',
        'userId',
        'startedAt',
        'endedAt',
      ],
      properties: {
        id: { type: 'string', format: 'uuid' },
        serviceName: { type: 'string' },
        servicePrice: {
          type: 'integer',
          minimum: 0,
          maximum: MAX_SERVICE_PRICE,
        },
        userId: { type: 'string', format: 'uuid' },
        startedAt: { type: 'string', format: 'date-time' },
        endedAt: {
          type: ['string', 'null'],
          format: 'date-time',
          description: 'null while the subscription is active',
        },
      },
    })
    .addSchema('SubscriptionInput', {
      type: 'object',
      required: ['serviceName', 'servicePrice', 'userId'],
      properties: {
        serviceName: { type: 'string', minLength: 1, example: 'Netflix' },
        servicePrice: {
          type: 'integer',
          minimum: 0,
          maximum: MAX_SERVICE_PRICE,
          example: 990,
        },
        userId: { type: 'string', format: 'uuid' },
        endedAt: { type: ['string', 'null'], format: 'date-time' },
      },
    })
    .addSchema('Meta', {
      type: 'object',
      required: ['requestId'],
      properties: { requestId: { type: 'string' } },
    })
    .addSchema('ErrorResponse', {
      type: 'object',
      required: ['error'],
      properties: {
        error: {
          type: 'object',
          required: ['code', 'message', 'requestId'],
          properties: {
            code: { type: 'string', enum: Object.keys(ERROR_STATUS_MAP) },
            message: { type: 'string' },
            details: { type: 'object' },
            requestId: { type: 'string' },
          },
        },
      },
    })
    .addParameter('SubscriptionId', {
      name: 'id',
      in: 'path',
      required: true,
      schema: { type: 'string', format: 'uuid' },
    })
    .addResponse(
      'ValidationError',
      jsonResponse('Invalid input', ref('schemas', 'ErrorResponse'))
    )
    .addResponse(
      'NotFound',
      jsonResponse('Subscription not found', ref('schemas', 'ErrorResponse'))
    )
    .addResponse(
      'StorageError',
      jsonResponse('Store unavailable', ref('schemas', 'ErrorResponse'))
    );

  builder
    .addPath(`${BASE_PATH}/subscriptions`, {
      post: createSubscription,
      get: listSubscriptions,
    })
    .addPath(`${BASE_PATH}/subscriptions/total`, { get: getTotalCost })
    .addPath(`${BASE_PATH}/subscriptions/{id}`, {
      get: getSubscription,
      put: updateSubscription,
      delete: deleteSubscription,
    })
    .addPath(`${BASE_PATH}/health`, { get: getHealth });

  return builder.getSpec();
}
