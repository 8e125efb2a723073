import 'reflect-metadata';
import { ConfigurationError } from './errors';

export const PRE_AUTHORIZE_METADATA_KEY = 'method-security:pre-authorize';

/**
 * @PreAuthorize decorator
 *
 * Declares the policy expression a caller must satisfy before the method runs.
 * On a class it is the default for every method that declares none; a
 * method-level declaration always wins over the class-level one. On a getter
 * or setter it covers the whole accessor.
 *
 * @example
 * ```typescript
 * @PreAuthorize('isAuthenticated()')
 * class ReportService {
 *   @PreAuthorize('hasRole("ADMIN")')
 *   purge() { ... }
 *
 *   list() { ... } // inherits isAuthenticated()
 * }
 * ```
 */
export function PreAuthorize(expression: string): ClassDecorator & MethodDecorator {
  return (target: object, propertyKey?: string | symbol, descriptor?: PropertyDescriptor): void => {
    if (propertyKey !== undefined) {
      // Stored on the function itself so overrides can be told apart
      const members = [descriptor?.value, descriptor?.get, descriptor?.set].filter(
        (member): member is object => typeof member === 'function',
      );
      if (members.length === 0) {
        throw new ConfigurationError(
          `@PreAuthorize on '${String(propertyKey)}' must decorate a method or accessor`,
        );
      }
      for (const member of members) {
        Reflect.defineMetadata(PRE_AUTHORIZE_METADATA_KEY, expression, member);
      }
      return;
    }
    Reflect.defineMetadata(PRE_AUTHORIZE_METADATA_KEY, expression, target);
  };
}
