import { DefaultObjectFactory, ObjectFactory } from '../factory';
import { DefaultReflectorFactory, ReflectorFactory } from '../reflection';
import { TypeExpression, TypeRegistry } from '../type-model';
import { Logger, noLogger } from '../util/logger';
import { DefaultObjectWrapperFactory, ObjectWrapperFactory } from '../wrapper';
import { MetaObject } from './meta-object';

/**
 * Collaborators a navigator is built from. Anything left out uses the shared default.
 */
export interface ReflectionOptions {
  objectFactory?: ObjectFactory;
  objectWrapperFactory?: ObjectWrapperFactory;
  /** Takes precedence over `registry` */
  reflectorFactory?: ReflectorFactory;
  /** Registry for a reflector factory created for this call */
  registry?: TypeRegistry;
  logger?: Logger;
}

export const DEFAULT_OBJECT_FACTORY: ObjectFactory = new DefaultObjectFactory();
export const DEFAULT_OBJECT_WRAPPER_FACTORY: ObjectWrapperFactory =
  new DefaultObjectWrapperFactory();
const DEFAULT_REFLECTOR_FACTORY: ReflectorFactory = new DefaultReflectorFactory();

export const SystemMetaObject = {
  DEFAULT_OBJECT_FACTORY,
  DEFAULT_OBJECT_WRAPPER_FACTORY,

  get NULL_META_OBJECT(): MetaObject {
    return MetaObject.NULL_META_OBJECT;
  },

  /**
   * Navigator over `object` built from the shared defaults, overridden by `options`
   */
  forObject(object: unknown, options: ReflectionOptions = {}, type?: TypeExpression): MetaObject {
    const logger = options.logger ?? noLogger;
    const reflectorFactory =
      options.reflectorFactory ??
      (options.registry
        ? new DefaultReflectorFactory(options.registry, logger)
        : DEFAULT_REFLECTOR_FACTORY);
    return MetaObject.forObject(
      object,
      options.objectFactory ?? DEFAULT_OBJECT_FACTORY,
      options.objectWrapperFactory ?? DEFAULT_OBJECT_WRAPPER_FACTORY,
      reflectorFactory,
      type,
      logger,
    );
  },
};
