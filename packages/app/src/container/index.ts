/**
 * Manual dependency injection container implementation
 */

import { createSilentLogger } from '@barwatch/logger';
import type { Logger } from '@barwatch/logger';
import { errorMessage } from '@barwatch/contracts';
import type {
  DependencyNode,
  HealthStatus,
  IContainer,
  RegistrationMetadata,
  Service,
  ServiceFactory,
  ServiceRegistration,
} from './types.js';

type Registrations<S extends object> = { [K in keyof S]?: ServiceRegistration<S, K> };

/**
 * Simple dependency injection container
 *
 * Services are started in dependency order and stopped in reverse, so a
 * service never outlives what it depends on.
 */
export class Container<S extends object> implements IContainer<S> {
  private instances: Partial<S> = {};
  private registrations: Registrations<S> = {};
  private order: Array<keyof S & string> = [];
  private initialized = new Set<string>();
  private logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  register<K extends keyof S & string>(
    token: K,
    factory: ServiceFactory<S, K>,
    metadata: RegistrationMetadata<S> = {}
  ): void {
    if (this.registrations[token] === undefined) {
      this.order.push(token);
    }
    this.registrations[token] = {
      token,
      factory,
      singleton: metadata.singleton !== false,
      dependencies: metadata.dependencies ?? [],
    };
  }

  resolve<K extends keyof S & string>(token: K): S[K] {
    const existing = this.instances[token];
    if (existing !== undefined) {
      return existing;
    }

    const registration = this.registrations[token];
    if (registration === undefined) {
      throw new Error(`Service not registered: ${token}`);
    }

    const instance = registration.factory(this);
    if (registration.singleton) {
      this.instances[token] = instance;
    }
    return instance;
  }

  has(token: keyof S & string): boolean {
    return this.registrations[token] !== undefined;
  }

  getDependencyGraph(): DependencyNode[] {
    const visited = new Set<string>();

    const buildNode = (token: keyof S & string): DependencyNode => {
      if (visited.has(token)) {
        return { name: token, dependencies: [], metadata: { circular: true } };
      }
      visited.add(token);
      const registration = this.registrations[token];
      return {
        name: token,
        dependencies: (registration?.dependencies ?? []).map(buildNode),
        metadata: {
          singleton: registration?.singleton,
          initialized: this.isInitializedToken(token),
        },
      };
    };

    const nodes: DependencyNode[] = [];
    for (const token of this.order) {
      if (!visited.has(token)) {
        nodes.push(buildNode(token));
      }
    }
    return nodes;
  }

  /**
   * Initializes every registered Service, dependencies first.
   */
  async initializeAll(): Promise<void> {
    const services = this.collectServices();
    const started = new Set<string>();

    const initialize = async (service: Service, path: string[]): Promise<void> => {
      if (started.has(service.name)) return;
      if (path.includes(service.name)) {
        throw new Error(`Circular service dependency: ${[...path, service.name].join(' -> ')}`);
      }
      for (const dependencyName of service.dependencies) {
        const dependency = services.find((candidate) => candidate.name === dependencyName);
        if (dependency !== undefined) {
          await initialize(dependency, [...path, service.name]);
        }
      }
      await service.initialize();
      started.add(service.name);
      this.initialized.add(service.name);
      this.logger.debug('Service initialized', { service: service.name });
    };

    for (const service of services) {
      await initialize(service, []);
    }
  }

  /**
   * Shuts down initialized services, dependents first. A failing shutdown
   * is logged and the others still run.
   */
  async shutdownAll(): Promise<void> {
    const services = this.collectServices().filter((service) => this.initialized.has(service.name));
    const stopped = new Set<string>();

    const shutdown = async (service: Service): Promise<void> => {
      if (stopped.has(service.name)) return;
      stopped.add(service.name);
      for (const dependent of services) {
        if (dependent.dependencies.includes(service.name)) {
          await shutdown(dependent);
        }
      }
      try {
        await service.shutdown();
      } catch (error) {
        this.logger.error('Service shutdown failed', { service: service.name, error: errorMessage(error) });
      }
    };

    for (const service of services) {
      await shutdown(service);
    }
    this.initialized.clear();
  }

  async healthCheckAll(): Promise<Map<string, HealthStatus>> {
    const results = new Map<string, HealthStatus>();
    for (const service of this.collectServices()) {
      if (!this.initialized.has(service.name)) continue;
      try {
        const status = await service.healthCheck();
        results.set(service.name, { ...status, lastCheck: new Date() });
      } catch (error) {
        results.set(service.name, {
          healthy: false,
          message: `Health check failed: ${errorMessage(error)}`,
          lastCheck: new Date(),
        });
      }
    }
    return results;
  }

  getWiringGraph(): string {
    const lines: string[] = ['[barwatch]'];

    const renderNode = (node: DependencyNode, prefix: string, isLast: boolean): void => {
      const connector = isLast ? '└─> ' : '├─> ';
      const status = node.metadata?.['initialized'] === true ? '✓' : '○';
      lines.push(`${prefix}${connector}[${node.name}] ${status}`);
      const childPrefix = prefix + (isLast ? '      ' : '│     ');
      node.dependencies.forEach((dependency, i) => {
        renderNode(dependency, childPrefix, i === node.dependencies.length - 1);
      });
    };

    const nodes = this.getDependencyGraph();
    nodes.forEach((node, i) => {
      renderNode(node, '  ', i === nodes.length - 1);
    });
    return lines.join('\n');
  }

  private collectServices(): Service[] {
    const services: Service[] = [];
    for (const token of this.order) {
      const instance: unknown = this.resolve(token);
      if (isService(instance) && !services.includes(instance)) {
        services.push(instance);
      }
    }
    return services;
  }

  private isInitializedToken(token: keyof S & string): boolean {
    const instance: unknown = this.instances[token];
    return isService(instance) && this.initialized.has(instance.name);
  }
}

export function isService(value: unknown): value is Service {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'dependencies' in value &&
    Array.isArray(value.dependencies) &&
    'initialize' in value &&
    typeof value.initialize === 'function' &&
    'shutdown' in value &&
    typeof value.shutdown === 'function' &&
    'healthCheck' in value &&
    typeof value.healthCheck === 'function'
  );
}

export type * from './types.js';
