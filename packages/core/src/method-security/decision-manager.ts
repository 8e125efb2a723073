import { CelExpressionEngine } from '../cel/evaluator';
import { assertExpressionEngine, type ExpressionEngine } from '../cel/expression-engine';
import { getDefaultLogger, type Logger } from '../utils/logger';
import {
  NO_POLICY,
  createExpressionAttribute,
  isNoPolicy,
  type PolicyAttribute,
} from './attribute';
import { ConfigurationError, PolicyEvaluationError } from './errors';
import { MetadataPolicyLocator, type PolicyLocator } from './locator';
import { AbstractExpressionAttributeRegistry, type RegistryStats } from './registry';
import {
  AuthorizationDecision,
  describeTarget,
  targetOf,
  type AuthenticationSupplier,
  type AuthorizationManager,
  type MethodAuthorizationContext,
  type PolicyTarget,
} from '../types/method-security.types';

export interface PreAuthorizeManagerOptions {
  /** Expression language (default: CelExpressionEngine) */
  expressionEngine?: ExpressionEngine;
  /** Declaration source (default: MetadataPolicyLocator) */
  locator?: PolicyLocator;
  logger?: Logger;
}

/**
 * Resolves pre-authorize declarations through a locator and parses them with
 * the manager's current expression engine.
 */
class PreAuthorizeExpressionAttributeRegistry extends AbstractExpressionAttributeRegistry<PolicyAttribute> {
  constructor(
    private readonly locator: PolicyLocator,
    private readonly engine: () => ExpressionEngine,
    private readonly logger: Logger,
  ) {
    super();
  }

  protected resolveAttribute(target: PolicyTarget): PolicyAttribute {
    const declaration = this.locator.locate(target);
    if (declaration === undefined) {
      this.logger.debug('No pre-authorize declaration', { target: describeTarget(target) });
      return NO_POLICY;
    }

    const expression = this.engine().parse(declaration);
    this.logger.debug('Resolved pre-authorize declaration', {
      target: describeTarget(target),
      expression: declaration,
    });
    return createExpressionAttribute(declaration, expression);
  }
}

/**
 * An {@link AuthorizationManager} deciding whether an {@link Authentication}
 * may invoke a method by evaluating the expression from its
 * {@link PreAuthorize} declaration.
 *
 * @example
 * ```typescript
 * const manager = new PreAuthorizeAuthorizationManager();
 *
 * const decision = manager.check(() => currentAuthentication(), {
 *   targetType: ReportService,
 *   invocation: { method: 'purge', receiver: service, args: [] },
 * });
 *
 * if (decision === undefined) {
 *   // no declaration: defer to the next authorization mechanism
 * }
 * ```
 */
export class PreAuthorizeAuthorizationManager
  implements AuthorizationManager<MethodAuthorizationContext>
{
  private readonly registry: PreAuthorizeExpressionAttributeRegistry;
  private expressionEngine: ExpressionEngine;

  constructor(options: PreAuthorizeManagerOptions = {}) {
    if ('expressionEngine' in options) {
      assertExpressionEngine(options.expressionEngine);
      this.expressionEngine = options.expressionEngine;
    } else {
      this.expressionEngine = new CelExpressionEngine();
    }

    const logger = (options.logger ?? getDefaultLogger()).child({ component: 'pre-authorize' });
    this.registry = new PreAuthorizeExpressionAttributeRegistry(
      options.locator ?? new MetadataPolicyLocator(),
      () => this.expressionEngine,
      logger,
    );
  }

  /**
   * Replace the expression engine. Only allowed before any target has been
   * resolved, since cached expressions belong to the engine that parsed them.
   * @throws ConfigurationError if the engine is invalid or targets are already cached
   */
  setExpressionEngine(expressionEngine: ExpressionEngine): void {
    assertExpressionEngine(expressionEngine);
    if (this.registry.size > 0) {
      throw new ConfigurationError(
        'expressionEngine cannot be replaced after policy attributes have been resolved',
        'expressionEngine',
      );
    }
    this.expressionEngine = expressionEngine;
  }

  /**
   * Determine if the supplied authentication may invoke the method.
   *
   * @param authentication - called only when a declaration applies
   * @returns the decision, or `undefined` when the method has no declaration
   * @throws PolicyParseError if the declaration is malformed
   * @throws PolicyEvaluationError if evaluation fails or is not boolean
   */
  check(
    authentication: AuthenticationSupplier,
    context: MethodAuthorizationContext,
  ): AuthorizationDecision | undefined {
    const attribute = this.registry.getAttribute(targetOf(context));
    if (isNoPolicy(attribute)) {
      return undefined;
    }

    const evaluationContext = this.expressionEngine.createEvaluationContext(
      authentication(),
      context.invocation,
    );
    const granted: unknown = this.expressionEngine.evaluateAsBoolean(
      attribute.expression,
      evaluationContext,
    );
    if (typeof granted !== 'boolean') {
      throw new PolicyEvaluationError(attribute.source, `expected a boolean result but got ${typeof granted}`);
    }
    return new AuthorizationDecision(granted);
  }

  getCacheStats(): RegistryStats {
    return this.registry.getStats();
  }
}
