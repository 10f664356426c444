import { ValueRecord } from './ast';
import { Interpreter, evaluate, valueEquals } from './interpreter';
import { parse } from './parser';

const values: ValueRecord = {
  workload: {
    name: 'api-server',
    type: 'deployment',
    labels: { app: 'api', tier: 'web' },
    cpu: { usage: 0.9, limit: 2 },
    memory: { usage: 0.5, limit: 4 },
  },
};

const run = (source: string, stepBudget = 1000) =>
  evaluate(parse(source, { maxDepth: 64 }), values, { stepBudget });

describe('evaluate', () => {
  it('should compare resource usage', () => {
    expect(run('workload.cpu.usage > 0.8')).toBe(true);
    expect(run('workload.memory.usage >= 0.8')).toBe(false);
  });

  it('should do arithmetic', () => {
    expect(run('workload.memory.usage * 100')).toBe(50);
    expect(run('7 % 4')).toBe(3);
    expect(run('-workload.cpu.limit + 1')).toBe(-1);
  });

  it('should read labels by key and by field', () => {
    expect(run('workload.labels["app"] == "api"')).toBe(true);
    expect(run('workload.labels.tier')).toBe('web');
  });

  it('should test membership', () => {
    expect(run('"tier" in workload.labels')).toBe(true);
    expect(run('workload.type in ["job", "cronjob"]')).toBe(false);
    expect(run('workload.name contains "server"')).toBe(true);
    expect(run('workload.name startsWith "api"')).toBe(true);
    expect(run('workload.name endsWith "api"')).toBe(false);
  });

  it('should call built-ins', () => {
    expect(run('max(1, workload.cpu.limit, 0.5)')).toBe(2);
    expect(run('min(3, 1)')).toBe(1);
    expect(run('abs(-3)')).toBe(3);
    expect(run('len(workload.name)')).toBe(10);
    expect(run('len(workload.labels)')).toBe(2);
    expect(run('upper(workload.labels.tier)')).toBe('WEB');
    expect(run('"a" + "b"')).toBe('ab');
  });

  it('should pick a conditional branch', () => {
    expect(run('workload.cpu.usage > 0.8 ? "hot" : "cold"')).toBe('hot');
  });

  it('should compare strings lexically', () => {
    expect(run('"apple" < "banana"')).toBe(true);
  });

  it('should divide by zero the IEEE way', () => {
    expect(run('1 / 0')).toBe(Infinity);
    expect(run('-1 / 0')).toBe(-Infinity);
    expect(run('0 / 0')).toBeNaN();
  });

  it('should short-circuit logic operators', () => {
    expect(run('false && workload.missing')).toBe(false);
    expect(run('true || 1 / 0 == 0')).toBe(true);
  });

  describe('failures', () => {
    it('should refuse modulo by zero', () => {
      expect(() => run('5 % 0')).toThrow('modulo by zero (at position 2)');
    });

    it('should report missing fields', () => {
      expect(() => run('workload.gpu.usage')).toThrow('missing value for "gpu" (at position 8)');
    });

    it('should report unbound names', () => {
      expect(() => run('node.name')).toThrow('no value bound to "node" (at position 0)');
    });

    it('should report out-of-range indexes', () => {
      expect(() => run('[1, 2][5]')).toThrow('index 5 out of range (at position 6)');
    });

    it('should report operand type mismatches', () => {
      expect(() => run('1 + "a"')).toThrow('expected number but found string (at position 2)');
    });

    it('should stop when the step budget runs out', () => {
      expect(() => run('1 + 2 + 3', 3)).toThrow('step budget of 3 exceeded');
      expect(run('1 + 2 + 3', 5)).toBe(6);
    });
  });

  it('should reset the step count on every run', () => {
    const interpreter = new Interpreter(values, { stepBudget: 5 });
    const expr = parse('1 + 2 + 3', { maxDepth: 64 });

    expect(interpreter.run(expr)).toBe(6);
    expect(interpreter.run(expr)).toBe(6);
  });
});

describe('valueEquals', () => {
  it('should compare lists and records structurally', () => {
    expect(valueEquals([1, { a: 'x' }], [1, { a: 'x' }])).toBe(true);
    expect(valueEquals({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(valueEquals([1], [1, 2])).toBe(false);
    expect(valueEquals([1], { 0: 1 })).toBe(false);
  });
});
