import {
  AutomationRule,
  Constraint,
  Objective,
  POLICY_KINDS,
  POLICY_STATUSES,
  Policy,
  PolicyAction,
  PolicyKind,
  PolicyMetadata,
  PolicySpec,
  PolicyTarget,
  Rule,
  WORKLOAD_STATUSES,
  WORKLOAD_TYPES,
  Workload,
  WorkloadRequirements,
} from '../types';
import { ValidationError } from './errors';

/**
 * Decoders from untrusted input (parsed JSON/YAML) to the typed document model.
 *
 * They check presence, JSON types and enum membership only; formats (DNS names,
 * label syntax, bounds) are checked by the structural validator on the decoded
 * value.
 */

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A top-level document: anything but a JSON object is a nil document
 */
export function requireDocument(input: unknown, what: string): UnknownRecord {
  if (!isRecord(input)) {
    throw new ValidationError('NIL_DOCUMENT', `${what} cannot be nil`);
  }
  return input;
}

export function requireRecord(source: UnknownRecord, key: string, path: string): UnknownRecord {
  const value = source[key];
  if (value === undefined || value === null) {
    throw new ValidationError('NIL_DOCUMENT', `${path} cannot be nil`);
  }
  if (!isRecord(value)) {
    throw new ValidationError('INVALID_FIELD', `${path} must be an object`);
  }
  return value;
}

/**
 * A string field that must be present and non-empty
 */
export function requireString(source: UnknownRecord, key: string, path: string): string {
  const value = source[key];
  if (value === undefined || value === null || value === '') {
    throw new ValidationError('EMPTY_INPUT', `${path} cannot be empty`);
  }
  if (typeof value !== 'string') {
    throw new ValidationError('INVALID_FIELD', `${path} must be a string`);
  }
  return value;
}

/**
 * A string field that must be present, but may be empty
 */
function requireText(source: UnknownRecord, key: string, path: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new ValidationError('INVALID_FIELD', `${path} must be a string`);
  }
  return value;
}

export function optionalString(source: UnknownRecord, key: string, path: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError('INVALID_FIELD', `${path} must be a string`);
  }
  return value;
}

function optionalNumber(source: UnknownRecord, key: string, path: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError('INVALID_FIELD', `${path} must be a number`);
  }
  return value;
}

function optionalBoolean(source: UnknownRecord, key: string, path: string): boolean | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ValidationError('INVALID_FIELD', `${path} must be a boolean`);
  }
  return value;
}

function optionalRecord(source: UnknownRecord, key: string, path: string): UnknownRecord | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ValidationError('INVALID_FIELD', `${path} must be an object`);
  }
  return value;
}

export function optionalStringMap(
  source: UnknownRecord,
  key: string,
  path: string
): Record<string, string> | undefined {
  const record = optionalRecord(source, key, path);
  if (!record) return undefined;

  // fromEntries defines own properties, so keys such as __proto__ survive
  return Object.fromEntries(
    Object.entries(record).map(([entryKey, entryValue]): [string, string] => {
      if (typeof entryValue !== 'string') {
        throw new ValidationError('INVALID_FIELD', `${path}.${entryKey} must be a string`);
      }
      return [entryKey, entryValue];
    })
  );
}

function optionalStringArray(source: UnknownRecord, key: string, path: string): string[] | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidationError('INVALID_FIELD', `${path} must be an array`);
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw new ValidationError('INVALID_FIELD', `${path}[${index}] must be a string`);
    }
    return item;
  });
}

/**
 * An optional array of objects, each decoded by `decode`; absent means empty
 */
function recordArray<T>(
  source: UnknownRecord,
  key: string,
  path: string,
  decode: (item: UnknownRecord, itemPath: string) => T
): T[] {
  const value = source[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ValidationError('INVALID_FIELD', `${path} must be an array`);
  }
  return value.map((item, index) => {
    const itemPath = `${path}[${index}]`;
    if (!isRecord(item)) {
      throw new ValidationError('INVALID_FIELD', `${itemPath} must be an object`);
    }
    return decode(item, itemPath);
  });
}

export function oneOf<T extends string>(value: string, allowed: readonly T[], path: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError('INVALID_FIELD', `${path} must be one of: ${allowed.join(', ')} (got ${value})`);
  }
  return match;
}

type MetadataFields = Omit<PolicyMetadata, 'type'>;
type SpecFields = Omit<PolicySpec, 'type'>;

export function decodePolicy(input: unknown): Policy {
  const document = requireDocument(input, 'policy');
  const metadata = requireRecord(document, 'metadata', 'metadata');
  const spec = requireRecord(document, 'spec', 'spec');

  const kind = oneOf(requireString(metadata, 'type', 'metadata.type'), POLICY_KINDS, 'metadata.type');
  const specKind = requireString(spec, 'type', 'spec.type');
  if (specKind !== kind) {
    throw new ValidationError('INVALID_FIELD', `metadata.type (${kind}) must match spec.type (${specKind})`);
  }

  const status = optionalString(metadata, 'status', 'metadata.status');
  const metadataFields: MetadataFields = {
    name: requireString(metadata, 'name', 'metadata.name'),
    status: status === undefined || status === '' ? undefined : oneOf(status, POLICY_STATUSES, 'metadata.status'),
    priority: optionalNumber(metadata, 'priority', 'metadata.priority'),
    namespace: optionalString(metadata, 'namespace', 'metadata.namespace'),
    labels: optionalStringMap(metadata, 'labels', 'metadata.labels'),
    annotations: optionalStringMap(metadata, 'annotations', 'metadata.annotations'),
  };

  const specFields: SpecFields = {
    target: decodeTarget(spec),
    objectives: recordArray(spec, 'objectives', 'spec.objectives', decodeObjective),
    constraints: recordArray(spec, 'constraints', 'spec.constraints', decodeConstraint),
    rules: recordArray(spec, 'rules', 'spec.rules', decodeRule),
    actions: recordArray(spec, 'actions', 'spec.actions', decodeAction),
  };

  return buildPolicy(kind, metadataFields, specFields);
}

function buildPolicy(kind: PolicyKind, metadata: MetadataFields, spec: SpecFields): Policy {
  switch (kind) {
    case 'cost-optimization':
      return { metadata: { ...metadata, type: kind }, spec: { ...spec, type: kind } };
    case 'automation':
      return { metadata: { ...metadata, type: kind }, spec: { ...spec, type: kind } };
    case 'workload-priority':
      return { metadata: { ...metadata, type: kind }, spec: { ...spec, type: kind } };
    case 'security':
      return { metadata: { ...metadata, type: kind }, spec: { ...spec, type: kind } };
    case 'resource-quota':
      return { metadata: { ...metadata, type: kind }, spec: { ...spec, type: kind } };
  }
}

function decodeTarget(spec: UnknownRecord): PolicyTarget | undefined {
  const target = optionalRecord(spec, 'target', 'spec.target');
  if (!target) return undefined;
  return {
    namespaces: optionalStringArray(target, 'namespaces', 'spec.target.namespaces'),
    workloadTypes: optionalStringArray(target, 'workloadTypes', 'spec.target.workloadTypes'),
    labelSelectors: optionalRecord(target, 'labelSelectors', 'spec.target.labelSelectors'),
  };
}

function decodeObjective(item: UnknownRecord, path: string): Objective {
  const weight = optionalNumber(item, 'weight', `${path}.weight`);
  if (weight === undefined) {
    throw new ValidationError('EMPTY_INPUT', `${path}.weight cannot be empty`);
  }
  return {
    type: requireString(item, 'type', `${path}.type`),
    weight,
    target: requireString(item, 'target', `${path}.target`),
  };
}

function decodeConstraint(item: UnknownRecord, path: string): Constraint {
  return {
    type: requireString(item, 'type', `${path}.type`),
    value: requireString(item, 'value', `${path}.value`),
    description: optionalString(item, 'description', `${path}.description`),
  };
}

/**
 * Rule fields may be empty here; emptiness is reported by the expression stage
 */
function decodeRule(item: UnknownRecord, path: string): Rule {
  return {
    name: requireText(item, 'name', `${path}.name`),
    condition: requireText(item, 'condition', `${path}.condition`),
    action: requireText(item, 'action', `${path}.action`),
    parameters: optionalRecord(item, 'parameters', `${path}.parameters`),
  };
}

function decodeAction(item: UnknownRecord, path: string): PolicyAction {
  return {
    type: requireString(item, 'type', `${path}.type`),
    parameters: optionalRecord(item, 'parameters', `${path}.parameters`),
  };
}

export function decodeWorkload(input: unknown): Workload {
  const document = requireDocument(input, 'workload');

  return {
    id: requireString(document, 'id', 'workload ID'),
    name: requireString(document, 'name', 'workload name'),
    type: oneOf(requireString(document, 'type', 'workload type'), WORKLOAD_TYPES, 'workload type'),
    status: oneOf(requireString(document, 'status', 'workload status'), WORKLOAD_STATUSES, 'workload status'),
    namespace: optionalString(document, 'namespace', 'namespace'),
    cluster_id: optionalString(document, 'cluster_id', 'cluster_id'),
    node_id: optionalString(document, 'node_id', 'node_id'),
    labels: optionalStringMap(document, 'labels', 'labels'),
    annotations: optionalStringMap(document, 'annotations', 'annotations'),
    requirements: decodeRequirements(document),
  };
}

function decodeRequirements(document: UnknownRecord): WorkloadRequirements | undefined {
  const requirements = optionalRecord(document, 'requirements', 'requirements');
  if (!requirements) return undefined;
  return {
    cpu: optionalString(requirements, 'cpu', 'requirements.cpu'),
    memory: optionalString(requirements, 'memory', 'requirements.memory'),
    storage: optionalString(requirements, 'storage', 'requirements.storage'),
  };
}

export function decodeAutomationRule(input: unknown): AutomationRule {
  const document = requireDocument(input, 'automation rule');

  return {
    trigger: requireString(document, 'trigger', 'automation rule trigger'),
    action: requireString(document, 'action', 'automation rule action'),
    conditions: optionalStringArray(document, 'conditions', 'conditions'),
    delay: optionalString(document, 'delay', 'delay'),
    immediate: optionalBoolean(document, 'immediate', 'immediate'),
  };
}
