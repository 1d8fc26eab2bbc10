import { defaultTypeRegistry, TypeDescriptor, TypeRegistry } from '../type-model';
import { Logger, noLogger } from '../util/logger';
import { Reflector } from './reflector';

export interface ReflectorFactory {
  isClassCacheEnabled(): boolean;
  setClassCacheEnabled(classCacheEnabled: boolean): void;
  findForType(type: TypeDescriptor): Reflector;
  /** Registry used to find the runtime type of values being reflected on */
  getTypeRegistry(): TypeRegistry;
}

/**
 * Builds reflectors lazily and keeps them for the life of the factory.
 * Reflectors are pure functions of their type, so a cache entry never goes stale.
 */
export class DefaultReflectorFactory implements ReflectorFactory {
  private classCacheEnabled = true;
  private readonly reflectorMap = new Map<TypeDescriptor, Reflector>();
  private readonly logger: Logger;

  constructor(
    private readonly registry: TypeRegistry = defaultTypeRegistry,
    logger: Logger = noLogger,
  ) {
    this.logger = logger.createNested('ReflectorFactory');
  }

  isClassCacheEnabled(): boolean {
    return this.classCacheEnabled;
  }

  setClassCacheEnabled(classCacheEnabled: boolean): void {
    this.classCacheEnabled = classCacheEnabled;
  }

  findForType(type: TypeDescriptor): Reflector {
    if (!this.classCacheEnabled) {
      return new Reflector(type);
    }
    let reflector = this.reflectorMap.get(type);
    if (!reflector) {
      reflector = new Reflector(type);
      this.reflectorMap.set(type, reflector);
      this.logger.debug('Cached reflector', {
        type: type.name,
        readable: reflector.getGetablePropertyNames(),
        writable: reflector.getSetablePropertyNames(),
      });
    }
    return reflector;
  }

  getTypeRegistry(): TypeRegistry {
    return this.registry;
  }
}
