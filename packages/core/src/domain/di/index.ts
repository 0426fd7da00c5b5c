/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @graphward/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Technology-agnostic contracts the infrastructure layer implements:
 * keys, lifetimes, descriptors, plans, interfaces and errors.
 *
 * ```typescript
 * import { createToken } from '@graphward/core/domain/di';
 *
 * interface ISauce { spread(): void; }
 * const ISauce = createToken<ISauce>('ISauce');
 *
 * class Blt {
 *   static inject = [Lettuce, Bacon, ISauce] as const;
 *   constructor(lettuce: Lettuce, bacon: Bacon, sauce: ISauce) {}
 * }
 * ```
 */

// ============================================================================
// Service Identifier
// ============================================================================

export {
  type ServiceIdentifier,
  type Constructor,
  type IInjectableConstructor,
  isServiceIdentifier,
  getServiceName,
  hasInjectProperty,
  getInjectDependencies,
  getAttachDependencies,
  createToken,
  qualify,
  // Pre-defined tokens
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_TOKEN,
} from './service-identifier';

// ============================================================================
// Service Lifetime
// ============================================================================

export {
  ServiceLifetime,
  getLifetimePriority,
  canDependOn,
  getLifetimeName,
} from './service-lifetime';

// ============================================================================
// Service Descriptor
// ============================================================================

export {
  type IServiceDescriptor,
  type IServiceDescriptorOptions,
  type IFactoryDescriptorOptions,
  type ServiceFactory,
  type IServiceResolver,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  validateDescriptor,
  getDescriptorName,
} from './service-descriptor';

// ============================================================================
// Resolution Plan
// ============================================================================

export { type IPlanStep, type IResolutionPlan } from './resolution-plan';

// ============================================================================
// DI Interfaces
// ============================================================================

export {
  type IDisposable,
  type IAttachable,
  type IServiceRegistrar,
  type IServiceCollection,
  type IServiceResolution,
  type IServiceProvider,
  type IServiceScope,
  type IServiceScopeFactory,
  type IScopeOptions,
  type IServiceCollectionOptions,
  type IBuildOptions,
  isDisposable,
  SERVICE_SCOPE_FACTORY_TOKEN,
} from './di.interface';

// ============================================================================
// DI Errors
// ============================================================================

export {
  DIError,
  UnboundKeyError,
  ConflictError,
  ContainerSealedError,
  CyclicDependencyError,
  ScopeMismatchError,
  UndeclaredDependencyError,
  ProviderFailure,
  ScopeDisposedError,
  ScopeOrderError,
  AlreadyClosedError,
} from './di.errors';
