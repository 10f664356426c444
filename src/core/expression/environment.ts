import { ConditionSample } from '../../types';
import { ExprType, NUMBER, STRING, ValueRecord, mapOf, objectOf } from './ast';

/**
 * The closed set of root bindings an expression may reference, with their field types
 */
export type Environment = Readonly<Record<string, ExprType>>;

/**
 * Names an expression must mention to be meaningful
 */
export const ROOT_BINDINGS = ['workload', 'policy', 'cluster'] as const;

const usage = objectOf({ usage: NUMBER, limit: NUMBER });

/**
 * Everything a policy rule may read
 */
export const FULL_ENVIRONMENT: Environment = {
  workload: objectOf({
    id: STRING,
    name: STRING,
    type: STRING,
    status: STRING,
    namespace: STRING,
    labels: mapOf(STRING),
    cpu: usage,
    memory: usage,
    storage: usage,
  }),
  policy: objectOf({
    id: STRING,
    name: STRING,
    type: STRING,
    status: STRING,
    priority: NUMBER,
  }),
  cluster: objectOf({
    resources: objectOf({ cpu: NUMBER, memory: NUMBER, storage: NUMBER }),
  }),
};

/**
 * The numeric sub-environment gating conditions are evaluated in
 */
export const CONDITION_ENVIRONMENT: Environment = {
  workload: objectOf({
    cpu: objectOf({ usage: NUMBER }),
    memory: objectOf({ usage: NUMBER }),
  }),
};

export function conditionSampleValues(sample: ConditionSample): ValueRecord {
  return {
    workload: {
      cpu: { usage: sample.cpuUsage },
      memory: { usage: sample.memoryUsage },
    },
  };
}
