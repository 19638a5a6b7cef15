/**
 * Core types for dependency injection container
 */

/**
 * Lifecycle every long-lived component implements
 */
export interface Service {
  readonly name: string;
  /** Names of services that must be initialized first */
  readonly dependencies: readonly string[];
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  healthCheck(): HealthStatus | Promise<HealthStatus>;
}

export interface HealthStatus {
  healthy: boolean;
  message?: string;
  details?: Record<string, unknown>;
  lastCheck?: Date;
}

/**
 * Dependency node for visualization
 */
export interface DependencyNode {
  name: string;
  dependencies: DependencyNode[];
  metadata?: Record<string, unknown>;
}

/**
 * Container over a map of service names to service types
 */
export interface IContainer<S extends object> {
  register<K extends keyof S & string>(token: K, factory: ServiceFactory<S, K>, metadata?: RegistrationMetadata<S>): void;
  resolve<K extends keyof S & string>(token: K): S[K];
  has(token: keyof S & string): boolean;
  getDependencyGraph(): DependencyNode[];
  getWiringGraph(): string;
  initializeAll(): Promise<void>;
  shutdownAll(): Promise<void>;
  healthCheckAll(): Promise<Map<string, HealthStatus>>;
}

export type ServiceFactory<S extends object, K extends keyof S> = (container: IContainer<S>) => S[K];

export interface RegistrationMetadata<S extends object> {
  /** Defaults to true */
  singleton?: boolean;
  /** Tokens this registration resolves, for the wiring graph */
  dependencies?: Array<keyof S & string>;
}

export interface ServiceRegistration<S extends object, K extends keyof S> {
  token: K;
  factory: ServiceFactory<S, K>;
  singleton: boolean;
  dependencies: Array<keyof S & string>;
}
