/**
 * Dependency Injection Container Implementation
 *
 * Provides a lightweight dependency injection container to manage service
 * instantiation and dependencies. Services are identified by typed tokens,
 * optionally qualified by an instance identifier, and factories run lazily
 * on first resolution.
 */

import { AppError } from '../errors/baseErrors';

/**
 * Identifies a service and carries its type
 */
export interface ServiceToken<T> {
  readonly name: string;
  /** Phantom field; never set at runtime */
  readonly __type?: T;
}

export function serviceToken<T>(name: string): ServiceToken<T> {
  return { name };
}

/**
 * `unitTesting` containers reject unseeded resolutions of services marked
 * as live-only, so tests never reach the network or the real file system
 * by accident
 */
export type ContainerContext = 'running' | 'unitTesting';

export type ServiceFactory<T> = (container: DIContainer) => T;

export interface RegistrationOptions {
  /** Memoize the first instance (default: true) */
  singleton?: boolean;
  /** Distinguishes several registrations of one token */
  instanceId?: string;
  /** Refuse to construct in the `unitTesting` context unless seeded */
  liveOnly?: boolean;
}

export interface DIContainer {
  readonly context: ContainerContext;
  register<T>(token: ServiceToken<T>, implementation: T, options?: RegistrationOptions): void;
  registerFactory<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, options?: RegistrationOptions): void;
  resolve<T>(token: ServiceToken<T>, instanceId?: string): T;
  isRegistered<T>(token: ServiceToken<T>, instanceId?: string): boolean;
}

interface ServiceRegistration<T> {
  instance?: { value: T };
  factory?: ServiceFactory<T>;
  singleton: boolean;
  liveOnly: boolean;
}

/**
 * Error raised when a service cannot be resolved
 */
export class ServiceResolutionError extends AppError {
  constructor(message: string, serviceName: string) {
    super(message, {
      code: 'SERVICE_RESOLUTION_ERROR',
      details: { service: serviceName },
      retryable: false,
      serviceId: 'DIContainer'
    });
  }
}

function detectContext(env: NodeJS.ProcessEnv): ContainerContext {
  return env.VITEST !== undefined || env.NODE_ENV === 'test' ? 'unitTesting' : 'running';
}

function registrationKey(name: string, instanceId?: string): string {
  return instanceId === undefined ? name : `${name}#${instanceId}`;
}

/**
 * Default implementation of the DIContainer interface
 */
export class DefaultDIContainer implements DIContainer {
  private registrations = new Map<string, ServiceRegistration<unknown>>();
  private readonly parent?: DIContainer;
  private contextOverride?: ContainerContext;
  private readonly detectedContext: ContainerContext;

  /**
   * Create a new dependency injection container
   *
   * @param parent Optional parent container for hierarchical DI
   * @param env Environment used to detect the default context
   */
  constructor(parent?: DIContainer, env: NodeJS.ProcessEnv = process.env) {
    this.parent = parent;
    this.detectedContext = detectContext(env);
  }

  get context(): ContainerContext {
    return this.contextOverride ?? this.parent?.context ?? this.detectedContext;
  }

  /**
   * Force a context regardless of the environment. Pass undefined to go back
   * to detection.
   */
  overrideContext(context: ContainerContext | undefined): void {
    this.contextOverride = context;
  }

  /**
   * Register a service implementation for a given token
   */
  register<T>(token: ServiceToken<T>, implementation: T, options: RegistrationOptions = {}): void {
    const registration: ServiceRegistration<T> = {
      instance: { value: implementation },
      singleton: options.singleton ?? true,
      liveOnly: false
    };
    this.store(token, registration, options.instanceId);
  }

  /**
   * Register a factory function for creating a service implementation
   *
   * The factory receives this container so it can resolve its own dependencies.
   */
  registerFactory<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, options: RegistrationOptions = {}): void {
    const registration: ServiceRegistration<T> = {
      factory,
      singleton: options.singleton ?? true,
      liveOnly: options.liveOnly ?? false
    };
    this.store(token, registration, options.instanceId);
  }

  /**
   * Replace a registration with a ready instance, for tests
   */
  seed<T>(token: ServiceToken<T>, implementation: T, instanceId?: string): void {
    this.register(token, implementation, { instanceId });
  }

  /**
   * Get an instance of a registered service
   *
   * @throws ServiceResolutionError if the service is not registered
   */
  resolve<T>(token: ServiceToken<T>, instanceId?: string): T {
    const registration = this.lookup(token, instanceId);

    if (registration) {
      if (registration.instance) {
        return registration.instance.value;
      }

      const factory = registration.factory;
      if (factory) {
        if (registration.liveOnly && this.context === 'unitTesting') {
          throw new ServiceResolutionError(
            `Service ${token.name} must be seeded when unit testing`,
            token.name
          );
        }
        const instance = factory(this);
        if (registration.singleton) {
          registration.instance = { value: instance };
        }
        return instance;
      }
    }

    if (this.parent && this.parent.isRegistered(token, instanceId)) {
      return this.parent.resolve(token, instanceId);
    }

    throw new ServiceResolutionError(
      `Service ${registrationKey(token.name, instanceId)} is not registered in the container`,
      token.name
    );
  }

  /**
   * Check if a service is registered here or in a parent
   */
  isRegistered<T>(token: ServiceToken<T>, instanceId?: string): boolean {
    if (this.registrations.has(registrationKey(token.name, instanceId))) {
      return true;
    }
    return this.parent?.isRegistered(token, instanceId) ?? false;
  }

  /**
   * Drop every local registration and memoized instance
   */
  removeAll(): void {
    this.registrations.clear();
  }

  /**
   * Create a child container that falls back to this one
   */
  createChild(): DefaultDIContainer {
    return new DefaultDIContainer(this);
  }

  private store<T>(token: ServiceToken<T>, registration: ServiceRegistration<T>, instanceId?: string): void {
    this.registrations.set(registrationKey(token.name, instanceId), registration);
  }

  private lookup<T>(token: ServiceToken<T>, instanceId?: string): ServiceRegistration<T> | undefined {
    // Only `store` writes under a token's name, always with that token's type
    return this.registrations.get(registrationKey(token.name, instanceId)) as ServiceRegistration<T> | undefined;
  }
}
