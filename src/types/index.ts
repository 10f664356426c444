/**
 * Policy kinds understood by the control plane
 */
export const POLICY_KINDS = [
  'cost-optimization',
  'automation',
  'workload-priority',
  'security',
  'resource-quota',
] as const;

export type PolicyKind = (typeof POLICY_KINDS)[number];

export const POLICY_STATUSES = ['active', 'inactive', 'draft'] as const;

export type PolicyStatus = (typeof POLICY_STATUSES)[number];

export const WORKLOAD_TYPES = ['deployment', 'statefulset', 'daemonset', 'job', 'cronjob'] as const;

export type WorkloadType = (typeof WORKLOAD_TYPES)[number];

export const WORKLOAD_STATUSES = ['running', 'stopped', 'pending', 'failed'] as const;

export type WorkloadStatus = (typeof WORKLOAD_STATUSES)[number];

/**
 * Priority bounds for policies (inclusive)
 */
export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 1000;

/**
 * Policy metadata
 */
export interface PolicyMetadata<K extends PolicyKind = PolicyKind> {
  name: string;
  type: K;
  status?: PolicyStatus;
  priority?: number;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

/**
 * Selects the workloads a policy applies to
 */
export interface PolicyTarget {
  namespaces?: string[];
  workloadTypes?: string[];
  labelSelectors?: Record<string, unknown>;
}

/**
 * An optimization objective; weights are fractions in [0, 1]
 */
export interface Objective {
  type: string;
  weight: number;
  target: string;
}

export interface Constraint {
  type: string;
  value: string;
  description?: string;
}

/**
 * A gating rule: when `condition` holds, `action` is applied
 */
export interface Rule {
  name: string;
  condition: string;
  action: string;
  parameters?: Record<string, unknown>;
}

export interface PolicyAction {
  type: string;
  parameters?: Record<string, unknown>;
}

export interface PolicySpec<K extends PolicyKind = PolicyKind> {
  type: K;
  target?: PolicyTarget;
  objectives: Objective[];
  constraints: Constraint[];
  rules: Rule[];
  actions: PolicyAction[];
}

interface PolicyDocument<K extends PolicyKind> {
  metadata: PolicyMetadata<K>;
  spec: PolicySpec<K>;
}

export type CostOptimizationPolicy = PolicyDocument<'cost-optimization'>;
export type AutomationPolicy = PolicyDocument<'automation'>;
export type WorkloadPriorityPolicy = PolicyDocument<'workload-priority'>;
export type SecurityPolicy = PolicyDocument<'security'>;
export type ResourceQuotaPolicy = PolicyDocument<'resource-quota'>;

/**
 * A policy document, discriminated by `metadata.type` (always equal to `spec.type`)
 */
export type Policy =
  | CostOptimizationPolicy
  | AutomationPolicy
  | WorkloadPriorityPolicy
  | SecurityPolicy
  | ResourceQuotaPolicy;

/**
 * Resource requests of a workload, in Kubernetes quantity notation
 */
export interface WorkloadRequirements {
  cpu?: string;
  memory?: string;
  storage?: string;
}

/**
 * A schedulable unit whose resource usage is subject to policy
 */
export interface Workload {
  id: string;
  name: string;
  type: WorkloadType;
  status: WorkloadStatus;
  namespace?: string;
  cluster_id?: string;
  node_id?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  requirements?: WorkloadRequirements;
}

/**
 * A trigger -> action binding with optional guard conditions
 */
export interface AutomationRule {
  trigger: string;
  action: string;
  conditions?: string[];
  delay?: string; // e.g. "30s", "5m"
  immediate?: boolean;
}

/**
 * A single JSON-Schema violation. `path` is a JSON pointer into the payload.
 */
export interface SchemaViolation {
  path: string;
  message: string;
}

export type SchemaValidationResult =
  | { valid: true }
  | { valid: false; violations: SchemaViolation[] };

/**
 * The stages a document passes through in the validation engine
 */
export type ValidationStage = 'structural' | 'schema' | 'expression';

export type EngineState = 'uninitialized' | 'initialized' | 'operating';

/**
 * Read-consistent view of the engine's validation counters
 */
export interface ValidationMetricsSnapshot {
  total: number;
  successful: number;
  failed: number;
  successRate: number;
  averageDurationMs: number;
  lastValidationTime?: Date;
}

/**
 * Sample values used to evaluate conditions at admission time
 */
export interface ConditionSample {
  cpuUsage: number;
  memoryUsage: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Validator configuration
 */
export interface AdmissionConfig {
  logLevel: LogLevel;
  server: {
    port: number;
  };
  expression: {
    maxLength: number;
    maxDepth: number;
    stepBudget: number;
    conditionSample: ConditionSample;
  };
  schemas: {
    directory?: string;
  };
}
