import { BOOLEAN, NUMBER, STRING, listOf } from './ast';
import { typeOf, isBuiltin } from './checker';
import { CONDITION_ENVIRONMENT, FULL_ENVIRONMENT } from './environment';
import { parse } from './parser';

const check = (source: string, env = FULL_ENVIRONMENT) => typeOf(parse(source, { maxDepth: 64 }), env);

describe('typeOf', () => {
  it('should type comparisons as boolean', () => {
    expect(check('workload.cpu.usage > 0.8')).toEqual(BOOLEAN);
    expect(check('policy.priority >= 100 && workload.status == "running"')).toEqual(BOOLEAN);
  });

  it('should type map lookups by the map value type', () => {
    expect(check('workload.labels["app"]')).toEqual(STRING);
    expect(check('workload.labels.tier')).toEqual(STRING);
  });

  it('should type built-in calls', () => {
    expect(check('len(workload.labels) + 1')).toEqual(NUMBER);
    expect(check('max(workload.cpu.usage, workload.memory.usage, 0.1)')).toEqual(NUMBER);
    expect(check('lower(workload.name)')).toEqual(STRING);
  });

  it('should type membership tests', () => {
    expect(check('"app" in workload.labels')).toEqual(BOOLEAN);
    expect(check('workload.type in ["job", "cronjob"]')).toEqual(BOOLEAN);
    expect(check('workload.name contains "api"')).toEqual(BOOLEAN);
    expect(check('workload.name startsWith "api"')).toEqual(BOOLEAN);
  });

  it('should type list literals and conditionals', () => {
    expect(check('[1, 2, 3]')).toEqual(listOf(NUMBER));
    expect(check('workload.cpu.usage > 0.8 ? "hot" : "cold"')).toEqual(STRING);
  });

  describe('closed environment', () => {
    it('should reject undefined names', () => {
      expect(() => check('foo > 1')).toThrow('undefined name "foo" (at position 0)');
    });

    it('should reject unknown fields', () => {
      expect(() => check('workload.gpu')).toThrow('unknown field "gpu" (at position 8)');
    });

    it('should reject unknown functions', () => {
      expect(() => check('exec(1)')).toThrow('unknown function "exec" (at position 0)');
    });

    it('should only expose usage in the condition environment', () => {
      expect(check('workload.cpu.usage > 0.5', CONDITION_ENVIRONMENT)).toEqual(BOOLEAN);
      expect(() => check('workload.cpu.limit > 1', CONDITION_ENVIRONMENT)).toThrow('unknown field "limit"');
      expect(() => check('policy.priority > 1', CONDITION_ENVIRONMENT)).toThrow('undefined name "policy"');
    });
  });

  describe('type errors', () => {
    it('should reject mixed arithmetic', () => {
      expect(() => check('workload.name + 1')).toThrow(
        'operator + cannot combine string and number (at position 14)'
      );
    });

    it('should reject non-boolean logic operands', () => {
      expect(() => check('workload.cpu.usage && true')).toThrow(
        'operator && cannot combine number and boolean (at position 19)'
      );
    });

    it('should reject equality between different types', () => {
      expect(() => check('workload.cpu.usage == "high"')).toThrow(
        'operator == cannot combine number and string (at position 19)'
      );
    });

    it('should reject negating a number', () => {
      expect(() => check('!workload.cpu.usage')).toThrow('operator ! needs boolean, got number (at position 0)');
    });

    it('should reject a non-boolean conditional test', () => {
      expect(() => check('workload.cpu ? 1 : 2')).toThrow(
        'condition of ?: must be boolean, got {usage, limit} (at position 13)'
      );
    });

    it('should reject empty list literals', () => {
      expect(() => check('[]')).toThrow('empty list literals have no type (at position 0)');
    });

    it('should check built-in arity', () => {
      expect(() => check('min(1)')).toThrow('min takes two or more numbers (at position 0)');
      expect(() => check('len(1)')).toThrow('len takes one string, list or map (at position 0)');
    });
  });
});

describe('isBuiltin', () => {
  it('should know the built-in functions only', () => {
    expect(isBuiltin('len')).toBe(true);
    expect(isBuiltin('exec')).toBe(false);
  });
});
