import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { PreAuthorizeAuthorizationManager } from '../../../src/method-security/decision-manager';
import { DescriptorTablePolicyLocator, MetadataPolicyLocator } from '../../../src/method-security/locator';
import { PreAuthorize } from '../../../src/method-security/decorators';
import {
  ConfigurationError,
  PolicyEvaluationError,
  PolicyParseError,
} from '../../../src/method-security/errors';
import { CelExpressionEngine } from '../../../src/cel/evaluator';
import type { ExpressionEngine } from '../../../src/cel/expression-engine';
import { Logger } from '../../../src/utils/logger';
import {
  AuthorizationDecision,
  type Authentication,
  type MethodAuthorizationContext,
  type TargetType,
} from '../../../src/types/method-security.types';
import { HealthService, ReportService, admin, anonymous, member } from '../../fixtures/services';

const silentLogger = new Logger({ level: 'silent' });

function invoke(
  targetType: TargetType,
  method: string,
  args: unknown[] = [],
  parameterNames?: string[],
): MethodAuthorizationContext {
  return { targetType, invocation: { method, args, parameterNames } };
}

function supply(authentication: Authentication) {
  return vi.fn(() => authentication);
}

describe('PreAuthorizeAuthorizationManager', () => {
  let engine: CelExpressionEngine;
  let locator: MetadataPolicyLocator;
  let manager: PreAuthorizeAuthorizationManager;

  beforeEach(() => {
    engine = new CelExpressionEngine();
    locator = new MetadataPolicyLocator();
    manager = new PreAuthorizeAuthorizationManager({
      expressionEngine: engine,
      locator,
      logger: silentLogger,
    });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('decisions', () => {
    it('should grant when the method declaration holds', () => {
      const decision = manager.check(supply(admin), invoke(ReportService, 'purge'));

      expect(decision).toBeInstanceOf(AuthorizationDecision);
      expect(decision?.granted).toBe(true);
    });

    it('should deny when the method declaration does not hold', () => {
      const decision = manager.check(supply(member), invoke(ReportService, 'purge'));

      expect(decision?.granted).toBe(false);
    });

    it('should apply the class declaration to undeclared methods', () => {
      expect(manager.check(supply(member), invoke(ReportService, 'list'))?.granted).toBe(true);
      expect(manager.check(supply(anonymous), invoke(ReportService, 'list'))?.granted).toBe(false);
    });

    it('should evaluate declarations on accessors', () => {
      class Vault {
        @PreAuthorize('hasRole("ADMIN")')
        get secret(): string {
          return 'classified';
        }

        @PreAuthorize('false')
        get sealed(): string {
          return 'sealed';
        }
      }

      expect(manager.check(supply(admin), invoke(Vault, 'secret'))?.granted).toBe(true);
      expect(manager.check(supply(member), invoke(Vault, 'secret'))?.granted).toBe(false);
      expect(manager.check(supply(admin), invoke(Vault, 'sealed'))?.granted).toBe(false);
    });

    it('should evaluate against the invocation arguments', () => {
      const context = invoke(ReportService, 'archive', ['bob'], ['ownerId']);

      expect(manager.check(supply(member), context)?.granted).toBe(true);
      expect(manager.check(supply(admin), context)?.granted).toBe(false);
    });
  });

  describe('abstention', () => {
    it('should abstain when no declaration applies', () => {
      const decision = manager.check(supply(admin), invoke(HealthService, 'ping'));

      expect(decision).toBeUndefined();
    });

    it('should not resolve the identity when abstaining', () => {
      const authentication = supply(admin);

      manager.check(authentication, invoke(HealthService, 'ping'));

      expect(authentication).not.toHaveBeenCalled();
    });

    it('should resolve the identity exactly once when a declaration applies', () => {
      const authentication = supply(admin);

      manager.check(authentication, invoke(ReportService, 'purge'));

      expect(authentication).toHaveBeenCalledTimes(1);
    });

    it('should not parse anything for undeclared targets', () => {
      const parse = vi.spyOn(engine, 'parse');

      manager.check(supply(admin), invoke(HealthService, 'ping'));
      manager.check(supply(admin), invoke(HealthService, 'ping'));

      expect(parse).not.toHaveBeenCalled();
    });
  });

  describe('idempotent resolution', () => {
    it('should locate and parse a declaration once across repeated checks', () => {
      const locate = vi.spyOn(locator, 'locate');
      const parse = vi.spyOn(engine, 'parse');

      for (let i = 0; i < 10; i++) {
        manager.check(supply(i % 2 === 0 ? admin : member), invoke(ReportService, 'purge'));
      }

      expect(locate).toHaveBeenCalledTimes(1);
      expect(parse).toHaveBeenCalledTimes(1);
      expect(manager.getCacheStats()).toEqual({ size: 1, hits: 9, misses: 1, hitRate: 0.9 });
    });

    it('should resolve concurrent first-time checks once', async () => {
      const parse = vi.spyOn(engine, 'parse');

      const decisions = await Promise.all(
        Array.from({ length: 50 }, async (_, i) => {
          await new Promise((resolve) => setTimeout(resolve, i % 5));
          return manager.check(supply(admin), invoke(ReportService, 'purge'));
        }),
      );

      expect(parse).toHaveBeenCalledTimes(1);
      expect(decisions.every((decision) => decision?.granted === true)).toBe(true);
      expect(manager.getCacheStats().size).toBe(1);
    });
  });

  describe('faults', () => {
    it('should surface parse errors on every check without caching them', () => {
      const parse = vi.spyOn(engine, 'parse');

      expect(() => manager.check(supply(admin), invoke(ReportService, 'broken'))).toThrow(PolicyParseError);
      expect(() => manager.check(supply(admin), invoke(ReportService, 'broken'))).toThrow(PolicyParseError);

      expect(parse).toHaveBeenCalledTimes(2);
      expect(manager.getCacheStats().size).toBe(0);
    });

    it('should raise an evaluation error for non-boolean expressions', () => {
      expect(() => manager.check(supply(admin), invoke(ReportService, 'count'))).toThrow(
        PolicyEvaluationError,
      );
    });

    it('should raise an evaluation error when a host engine returns a non-boolean', () => {
      const hostEngine: ExpressionEngine<string, null> = {
        parse: (expression) => expression,
        createEvaluationContext: () => null,
        evaluateAsBoolean: vi.fn().mockReturnValue('yes'),
      };
      const hosted = new PreAuthorizeAuthorizationManager({
        expressionEngine: hostEngine,
        logger: silentLogger,
      });

      expect(() => hosted.check(supply(admin), invoke(ReportService, 'purge'))).toThrow(
        `Failed to evaluate policy expression 'hasRole("ADMIN")': expected a boolean result but got string`,
      );
    });

    it('should not cache evaluation errors', () => {
      const evaluateAsBoolean = vi
        .fn()
        .mockImplementationOnce(() => {
          throw new PolicyEvaluationError('flaky', 'missing context data');
        })
        .mockReturnValue(true);
      const hostEngine: ExpressionEngine<string, null> = {
        parse: vi.fn((expression: string) => expression),
        createEvaluationContext: () => null,
        evaluateAsBoolean,
      };
      const hosted = new PreAuthorizeAuthorizationManager({
        expressionEngine: hostEngine,
        logger: silentLogger,
      });

      expect(() => hosted.check(supply(admin), invoke(ReportService, 'purge'))).toThrow(
        PolicyEvaluationError,
      );
      expect(hosted.check(supply(admin), invoke(ReportService, 'purge'))?.granted).toBe(true);
      expect(hostEngine.parse).toHaveBeenCalledTimes(1);
    });
  });

  describe('configuration', () => {
    it('should reject a null expression engine', () => {
      expect(() =>
        manager.setExpressionEngine(null as unknown as ExpressionEngine),
      ).toThrow(ConfigurationError);
    });

    it('should reject an incomplete expression engine', () => {
      const incomplete = { parse: (expression: string) => expression };

      expect(() =>
        manager.setExpressionEngine(incomplete as unknown as ExpressionEngine),
      ).toThrow(/createEvaluationContext must be a function/);
    });

    it('should reject an explicitly missing engine at construction', () => {
      expect(() => new PreAuthorizeAuthorizationManager({ expressionEngine: undefined })).toThrow(
        'expressionEngine cannot be null',
      );
    });

    it('should use a replacement engine set before any resolution', () => {
      const replacement = new CelExpressionEngine();
      const parse = vi.spyOn(replacement, 'parse');

      manager.setExpressionEngine(replacement);
      manager.check(supply(admin), invoke(ReportService, 'purge'));

      expect(parse).toHaveBeenCalledTimes(1);
    });

    it('should refuse to replace the engine once attributes are cached', () => {
      manager.check(supply(admin), invoke(HealthService, 'ping'));

      expect(() => manager.setExpressionEngine(new CelExpressionEngine())).toThrow(
        'expressionEngine cannot be replaced after policy attributes have been resolved',
      );
    });

    it('should default to the CEL engine and decorator metadata', () => {
      const defaults = new PreAuthorizeAuthorizationManager({ logger: silentLogger });

      expect(defaults.check(supply(admin), invoke(ReportService, 'purge'))?.granted).toBe(true);
    });

    it('should apply the role prefix from the environment to the default engine', () => {
      class Directory {
        @PreAuthorize('hasRole("GROUP_ADMIN")')
        manage(): void {}
      }
      vi.stubEnv('METHOD_SECURITY_ROLE_PREFIX', 'GROUP_');
      const defaults = new PreAuthorizeAuthorizationManager({ logger: silentLogger });

      expect(defaults.check(supply(admin), invoke(Directory, 'manage'))?.granted).toBe(true);
      expect(defaults.check(supply(member), invoke(Directory, 'manage'))?.granted).toBe(false);
    });

    it('should resolve declarations through a supplied locator', () => {
      class Ledger {
        post(): void {}
        read(): void {}
      }
      const table = new DescriptorTablePolicyLocator()
        .declareType(Ledger, 'authentication.authenticated')
        .declareMethod(Ledger, 'post', 'hasRole("ACCOUNTANT")');
      const tabled = new PreAuthorizeAuthorizationManager({ locator: table, logger: silentLogger });

      expect(tabled.check(supply(admin), invoke(Ledger, 'post'))?.granted).toBe(false);
      expect(tabled.check(supply(admin), invoke(Ledger, 'read'))?.granted).toBe(true);
    });
  });

  describe('worked example', () => {
    @PreAuthorize('isAuthenticated()')
    class T {
      @PreAuthorize('hasRole("ADMIN")')
      m(): void {}

      n(): void {}
    }

    class U {
      p(): void {}
    }

    it('should grant T.m to an ADMIN', () => {
      expect(manager.check(supply(admin), invoke(T, 'm'))?.granted).toBe(true);
    });

    it('should deny T.m to a caller without ADMIN', () => {
      const decision = manager.check(supply(member), invoke(T, 'm'));

      expect(decision).toBeDefined();
      expect(decision?.granted).toBe(false);
      expect(decision?.toString()).toBe('AuthorizationDecision [granted=false]');
    });

    it('should grant T.n to an authenticated caller through the class declaration', () => {
      expect(manager.check(supply(member), invoke(T, 'n'))?.granted).toBe(true);
    });

    it('should deny T.n to an anonymous caller', () => {
      expect(manager.check(supply(anonymous), invoke(T, 'n'))?.granted).toBe(false);
    });

    it('should abstain on U.p', () => {
      expect(manager.check(supply(admin), invoke(U, 'p'))).toBeUndefined();
    });
  });
});
