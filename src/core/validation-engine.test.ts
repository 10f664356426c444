import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ValidationEngine, createValidationEngine } from './validation-engine';
import { SchemaViolationError, ValidationStageError, findViolations } from './errors';
import { getDefaultConfig } from '../config';
import { AdmissionConfig } from '../types';
import { CLOCK_ORIGIN, FakeClock } from '../../tests/helpers/fakeClock';
import { MockLogger } from '../../tests/helpers/mockLogger';
import { rejectionOf } from '../../tests/helpers/failures';
import { policyWith, validAutomationRule, validPolicy, validWorkload } from '../../tests/helpers/documents';

describe('ValidationEngine', () => {
  let config: AdmissionConfig;
  let logger: MockLogger;
  let clock: FakeClock;
  let engine: ValidationEngine;

  beforeEach(() => {
    config = getDefaultConfig();
    logger = new MockLogger();
    clock = new FakeClock();
    engine = new ValidationEngine(config, logger, clock);
  });

  describe('before initialize', () => {
    it('should start uninitialized', () => {
      expect(engine.getState()).toBe('uninitialized');
    });

    it('should fail validations fast without touching metrics', async () => {
      const error = await rejectionOf(engine.validateWorkload(validWorkload));

      expect(error.code).toBe('NOT_INITIALIZED');
      expect(error.message).toBe('validation engine is not initialized');
      expect((await engine.metrics()).total).toBe(0);
    });

    it('should report unhealthy', async () => {
      const error = await rejectionOf(engine.health());

      expect(error.code).toBe('NOT_INITIALIZED');
      expect(error.message).toBe('policy validator not initialized');
    });

    it('should refuse component access', () => {
      expect(() => engine.getSchemaStore()).toThrow('validation engine is not initialized');
      expect(() => engine.getExpressionAnalyzer()).toThrow('validation engine is not initialized');
      expect(() => engine.getPolicyValidator()).toThrow('validation engine is not initialized');
    });
  });

  describe('initialize', () => {
    it('should load the built-in schemas and start operating', async () => {
      await engine.initialize();

      expect(engine.getState()).toBe('operating');
      expect(engine.getSchemaStore().listSchemas()).toEqual(['policy', 'workload']);
      expect(logger.info).toHaveBeenCalledWith('Validation engine initialized successfully', {
        schemas: ['policy', 'workload'],
      });
      await expect(engine.health()).resolves.toBeUndefined();
    });

    it('should stay uninitialized when aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await rejectionOf(engine.initialize(controller.signal));

      expect(error.code).toBe('INITIALIZATION');
      expect(error.message).toMatch(/^failed to initialize validation engine: /);
      expect(engine.getState()).toBe('uninitialized');
    });

    describe('with a schema directory', () => {
      let directory: string;

      beforeEach(() => {
        directory = fs.mkdtempSync(path.join(os.tmpdir(), 'admission-schemas-'));
        config.schemas.directory = directory;
      });

      afterEach(() => {
        fs.rmSync(directory, { recursive: true, force: true });
      });

      it('should load every json file by base name', async () => {
        fs.writeFileSync(path.join(directory, 'contact.json'), '{"type":"object","required":["email"]}');
        fs.writeFileSync(path.join(directory, 'README.md'), 'not a schema');

        await engine.initialize();

        expect(engine.getSchemaStore().listSchemas()).toEqual(['contact', 'policy', 'workload']);
        expect(engine.getSchemaStore().validate('contact', '{}')).toEqual({
          valid: false,
          violations: [{ path: '/email', message: "must have required property 'email'" }],
        });
      });

      it('should fail and stay uninitialized on a broken schema', async () => {
        fs.writeFileSync(path.join(directory, 'broken.json'), '{"type":"not-a-type"}');

        const error = await rejectionOf(engine.initialize());

        expect(error.code).toBe('INITIALIZATION');
        expect(error.message).toMatch(/^failed to initialize validation engine: failed to load broken schema: /);
        expect(engine.getState()).toBe('uninitialized');
        expect(() => engine.getSchemaStore()).toThrow('validation engine is not initialized');
      });

      it('should fail on a missing directory', async () => {
        config.schemas.directory = path.join(directory, 'missing');

        const error = await rejectionOf(engine.initialize());

        expect(error.code).toBe('INITIALIZATION');
        expect(engine.getState()).toBe('uninitialized');
      });

      it('should pick up new files on reload', async () => {
        await engine.initialize();
        fs.writeFileSync(path.join(directory, 'contact.json'), '{"type":"object"}');

        await engine.reloadSchemas();

        expect(engine.getSchemaStore().listSchemas()).toEqual(['contact', 'policy', 'workload']);
        expect(logger.info).toHaveBeenCalledWith('Schemas reloaded', { schemas: ['contact', 'policy', 'workload'] });
      });
    });
  });

  describe('when operating', () => {
    beforeEach(async () => {
      await engine.initialize();
    });

    describe('validatePolicy', () => {
      it('should return the typed policy', async () => {
        const policy = await engine.validatePolicy(validPolicy());

        expect(policy.metadata.name).toBe('cost-saver');
        expect(policy.spec.rules).toHaveLength(1);
        expect(logger.info).toHaveBeenCalledWith('Policy validated successfully', { policy_name: 'cost-saver' });
        expect(await engine.metrics()).toMatchObject({ total: 1, successful: 1, failed: 0 });
      });

      it('should tag structural failures', async () => {
        const input = validPolicy();
        const error = await rejectionOf(
          engine.validatePolicy({ ...input, metadata: { name: 'Bad_Name', type: 'cost-optimization' } })
        );

        expect(error).toBeInstanceOf(ValidationStageError);
        expect(error instanceof ValidationStageError && error.stage).toBe('structural');
        expect(error.code).toBe('INVALID_FIELD');
        expect(error.message).toBe(
          'structural validation failed: metadata validation failed: invalid name: name must be a valid DNS subdomain name (lowercase alphanumeric and hyphens only)'
        );
      });

      it('should reject a policy without priority or status', async () => {
        const bare = await rejectionOf(
          engine.validatePolicy({ metadata: { name: 'p', type: 'security' }, spec: { type: 'security' } })
        );
        const noStatus = await rejectionOf(
          engine.validatePolicy({ metadata: { name: 'p', type: 'security', priority: 5 }, spec: { type: 'security' } })
        );

        expect(bare instanceof ValidationStageError && bare.stage).toBe('structural');
        expect(bare.code).toBe('EMPTY_INPUT');
        expect(bare.message).toBe('structural validation failed: policy priority must be greater than 0');
        expect(noStatus.message).toBe('structural validation failed: policy status cannot be empty');
        expect(await engine.metrics()).toMatchObject({ total: 2, successful: 0, failed: 2 });
      });

      it('should tag schema failures and keep the violations', async () => {
        const error = await rejectionOf(
          engine.validatePolicy(policyWith({ objectives: [{ type: 'cost', weight: 1.5, target: '20%' }] }))
        );

        expect(error instanceof ValidationStageError && error.stage).toBe('schema');
        expect(error.code).toBe('SCHEMA_VIOLATION');
        expect(error.cause).toBeInstanceOf(SchemaViolationError);
        expect(findViolations(error)).toEqual([{ path: '/spec/objectives/0/weight', message: 'must be <= 1' }]);
      });

      it('should check every rule and name the failing one', async () => {
        const error = await rejectionOf(
          engine.validatePolicy(
            policyWith({
              rules: [
                { name: 'cpu-high', condition: 'workload.cpu.usage > 0.8', action: 'scale-up' },
                { name: 'wipe', condition: 'workload.cpu.usage > 0.9', action: 'delete-everything' },
              ],
            })
          )
        );

        expect(error instanceof ValidationStageError && error.stage).toBe('expression');
        expect(error.code).toBe('UNKNOWN_ACTION');
        expect(error.message).toBe(
          'expression validation failed: rule[1] "wipe": rule action validation failed: invalid action: delete-everything'
        );
      });

      it('should report empty rule conditions from the expression stage', async () => {
        const error = await rejectionOf(
          engine.validatePolicy(policyWith({ rules: [{ name: 'empty', condition: '', action: 'log' }] }))
        );

        expect(error.code).toBe('EMPTY_INPUT');
        expect(error.message).toBe('expression validation failed: rule[0] "empty": rule condition cannot be empty');
      });
    });

    describe('validateWorkload', () => {
      it('should return the typed workload', async () => {
        const workload = await engine.validateWorkload(validWorkload);

        expect(workload.id).toBe('wl-1');
        expect(logger.info).toHaveBeenCalledWith('Workload validated successfully', { workload_id: 'wl-1' });
      });

      it('should tag structural failures', async () => {
        const error = await rejectionOf(engine.validateWorkload({ ...validWorkload, type: 'vm' }));

        expect(error instanceof ValidationStageError && error.stage).toBe('structural');
        expect(error.message).toBe(
          'structural validation failed: workload type must be one of: deployment, statefulset, daemonset, job, cronjob (got vm)'
        );
      });
    });

    describe('validateAutomationRule', () => {
      it('should return the typed rule', async () => {
        const rule = await engine.validateAutomationRule(validAutomationRule);

        expect(rule.trigger).toBe('cpu-usage-spike');
        expect(logger.info).toHaveBeenCalledWith('Automation rule validated successfully', {
          rule_trigger: 'cpu-usage-spike',
        });
      });

      it('should tag vocabulary failures as expression failures', async () => {
        const error = await rejectionOf(
          engine.validateAutomationRule({ ...validAutomationRule, action: 'delete-everything' })
        );

        expect(error instanceof ValidationStageError && error.stage).toBe('expression');
        expect(error.message).toBe(
          'expression validation failed: action validation failed: invalid action: delete-everything'
        );
      });
    });

    describe('validateExpression', () => {
      it('should accept a safe expression', async () => {
        await expect(engine.validateExpression('workload.cpu.usage > 0.8')).resolves.toBeUndefined();
      });

      it('should run the structural checks first', async () => {
        const error = await rejectionOf(engine.validateExpression(''));

        expect(error instanceof ValidationStageError && error.stage).toBe('structural');
        expect(error.message).toBe('structural validation failed: expression cannot be empty');
      });

      it('should reject dangerous expressions', async () => {
        const error = await rejectionOf(engine.validateExpression('os.Exit(1)'));

        expect(error instanceof ValidationStageError && error.stage).toBe('expression');
        expect(error.code).toBe('DANGEROUS_EXPRESSION');
      });
    });

    describe('metrics', () => {
      it('should report the success rate over every call', async () => {
        await Promise.allSettled([
          engine.validateWorkload(validWorkload),
          engine.validateWorkload({ ...validWorkload, status: 'gone' }),
          engine.validatePolicy(validPolicy()),
          engine.validateExpression('foo > 1'),
          engine.validateAutomationRule(validAutomationRule),
        ]);

        expect(await engine.metrics()).toEqual({
          total: 5,
          successful: 3,
          failed: 2,
          successRate: 60,
          averageDurationMs: 0,
          lastValidationTime: new Date(CLOCK_ORIGIN),
        });
      });

      it('should account elapsed time', async () => {
        const pending = engine.validateWorkload(validWorkload);
        clock.advance(8);
        await pending;

        expect((await engine.metrics()).averageDurationMs).toBe(8);
      });

      it('should reset counters but keep schemas', async () => {
        await engine.validateWorkload(validWorkload);

        engine.resetMetrics();

        expect((await engine.metrics()).total).toBe(0);
        expect(engine.getSchemaStore().listSchemas()).toEqual(['policy', 'workload']);
      });

      it('should honour an aborted signal', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(engine.metrics(controller.signal)).rejects.toThrow();
      });
    });
  });

  describe('createValidationEngine', () => {
    it('should build an uninitialized engine', () => {
      expect(createValidationEngine(getDefaultConfig(), logger).getState()).toBe('uninitialized');
    });
  });
});
