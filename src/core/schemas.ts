import { SchemaObject } from 'ajv';
import { POLICY_KINDS, POLICY_STATUSES, WORKLOAD_STATUSES, WORKLOAD_TYPES, MIN_PRIORITY, MAX_PRIORITY } from '../types';

/**
 * Built-in schemas registered at startup.
 * Downstream consumers depend on these names, enums and bounds; change them together
 * with the typed model in `src/types`.
 */

const DNS_LABEL_PATTERN = '^[a-z0-9]([a-z0-9\\-]*[a-z0-9])?$';

export const PolicySchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['metadata', 'spec'],
  properties: {
    metadata: {
      type: 'object',
      required: ['name', 'type'],
      properties: {
        name: { type: 'string', pattern: DNS_LABEL_PATTERN, maxLength: 253 },
        type: { type: 'string', enum: [...POLICY_KINDS] },
        status: { type: 'string', enum: [...POLICY_STATUSES] },
        priority: { type: 'integer', minimum: MIN_PRIORITY, maximum: MAX_PRIORITY },
        namespace: { type: 'string', pattern: DNS_LABEL_PATTERN, maxLength: 63 },
        labels: {
          type: 'object',
          additionalProperties: { type: 'string', maxLength: 63 },
        },
        annotations: {
          type: 'object',
          additionalProperties: { type: 'string', maxLength: 262144 },
        },
      },
    },
    spec: {
      type: 'object',
      required: ['type'],
      properties: {
        type: { type: 'string', enum: [...POLICY_KINDS] },
        target: {
          type: 'object',
          properties: {
            namespaces: { type: 'array', items: { type: 'string' } },
            workloadTypes: { type: 'array', items: { type: 'string' } },
            labelSelectors: { type: 'object' },
          },
        },
        objectives: {
          type: 'array',
          items: {
            type: 'object',
            required: ['type', 'weight', 'target'],
            properties: {
              type: { type: 'string' },
              weight: { type: 'number', minimum: 0, maximum: 1 },
              target: { type: 'string' },
            },
          },
        },
        constraints: {
          type: 'array',
          items: {
            type: 'object',
            required: ['type', 'value'],
            properties: {
              type: { type: 'string' },
              value: { type: 'string' },
              description: { type: 'string' },
            },
          },
        },
        rules: {
          type: 'array',
          items: {
            type: 'object',
            required: ['name', 'condition', 'action'],
            properties: {
              name: { type: 'string' },
              condition: { type: 'string' },
              action: { type: 'string' },
              parameters: { type: 'object' },
            },
          },
        },
        actions: {
          type: 'array',
          items: {
            type: 'object',
            required: ['type'],
            properties: {
              type: { type: 'string' },
              parameters: { type: 'object' },
            },
          },
        },
      },
    },
  },
};

export const WorkloadSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['id', 'name', 'type', 'status'],
  properties: {
    id: { type: 'string', minLength: 1 },
    name: { type: 'string', minLength: 1 },
    type: { type: 'string', enum: [...WORKLOAD_TYPES] },
    status: { type: 'string', enum: [...WORKLOAD_STATUSES] },
    namespace: { type: 'string' },
    cluster_id: { type: 'string' },
    node_id: { type: 'string' },
    labels: {
      type: 'object',
      additionalProperties: { type: 'string' },
    },
    annotations: {
      type: 'object',
      additionalProperties: { type: 'string' },
    },
    requirements: {
      type: 'object',
      properties: {
        cpu: { type: 'string' },
        memory: { type: 'string' },
        storage: { type: 'string' },
      },
    },
  },
};

export const BUILTIN_SCHEMAS: Record<string, SchemaObject> = {
  policy: PolicySchema,
  workload: WorkloadSchema,
};
