import 'reflect-metadata';
import { PRE_AUTHORIZE_METADATA_KEY } from './decorators';
import type { MethodKey, PolicyTarget, TargetType } from '../types/method-security.types';

/**
 * Finds the single raw policy declaration that applies to a target.
 *
 * Implementations do no caching and no parsing; both belong to the registry.
 */
export interface PolicyLocator {
  locate(target: PolicyTarget): string | undefined;
}

function readDeclaration(holder: object, inherited: boolean): string | undefined {
  const value: unknown = inherited
    ? Reflect.getMetadata(PRE_AUTHORIZE_METADATA_KEY, holder)
    : Reflect.getOwnMetadata(PRE_AUTHORIZE_METADATA_KEY, holder);
  return typeof value === 'string' ? value : undefined;
}

// Accessor declarations live on the getter or setter, see PreAuthorize
function readMemberDeclaration(descriptor: PropertyDescriptor): string | undefined {
  for (const member of [descriptor.value, descriptor.get, descriptor.set]) {
    if (typeof member === 'function') {
      const declaration = readDeclaration(member, false);
      if (declaration !== undefined) {
        return declaration;
      }
    }
  }
  return undefined;
}

function ownConstructor(proto: object): object | undefined {
  const constructor: unknown = Object.getOwnPropertyDescriptor(proto, 'constructor')?.value;
  return typeof constructor === 'function' ? constructor : undefined;
}

/**
 * Locates declarations written with the {@link PreAuthorize} decorator.
 *
 * Search order, first hit wins:
 * 1. the method as defined on the target type
 * 2. methods it overrides, nearest ancestor first
 * 3. the class that declares the method as seen from the target type, then
 *    its ancestor classes
 *
 * A method the target type inherits without overriding is declared by the
 * ancestor that defines it, so a subclass declaration does not cover it.
 * Members no class in the chain defines fall back to the target type.
 */
export class MetadataPolicyLocator implements PolicyLocator {
  locate({ type, method }: PolicyTarget): string | undefined {
    let declaringType: object | undefined;
    let proto: unknown = type.prototype;

    while (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
      const descriptor = Object.getOwnPropertyDescriptor(proto, method);
      if (descriptor) {
        if (declaringType === undefined) {
          declaringType = ownConstructor(proto);
        }
        const declaration = readMemberDeclaration(descriptor);
        if (declaration !== undefined) {
          return declaration;
        }
      }
      proto = Object.getPrototypeOf(proto);
    }

    // Reflect metadata lookup follows the constructor chain upwards
    return readDeclaration(declaringType ?? type, true);
  }
}

interface TypeDescriptor {
  expression?: string;
  readonly methods: Map<MethodKey, string>;
}

/**
 * Locator backed by an explicitly registered descriptor table, for code that
 * cannot carry decorators.
 *
 * @example
 * ```typescript
 * const locator = new DescriptorTablePolicyLocator()
 *   .declareType(ReportService, 'isAuthenticated()')
 *   .declareMethod(ReportService, 'purge', 'hasRole("ADMIN")');
 * ```
 */
export class DescriptorTablePolicyLocator implements PolicyLocator {
  private readonly table: Map<TargetType, TypeDescriptor> = new Map();

  declareType(type: TargetType, expression: string): this {
    this.descriptorFor(type).expression = expression;
    return this;
  }

  declareMethod(type: TargetType, method: MethodKey, expression: string): this {
    this.descriptorFor(type).methods.set(method, expression);
    return this;
  }

  locate({ type, method }: PolicyTarget): string | undefined {
    const descriptor = this.table.get(type);
    if (!descriptor) {
      return undefined;
    }
    return descriptor.methods.get(method) ?? descriptor.expression;
  }

  private descriptorFor(type: TargetType): TypeDescriptor {
    let descriptor = this.table.get(type);
    if (!descriptor) {
      descriptor = { methods: new Map() };
      this.table.set(type, descriptor);
    }
    return descriptor;
  }
}
