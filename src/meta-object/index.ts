export { MetaObject } from './meta-object';
export {
  SystemMetaObject,
  DEFAULT_OBJECT_FACTORY,
  DEFAULT_OBJECT_WRAPPER_FACTORY,
} from './system-meta-object';
export type { ReflectionOptions } from './system-meta-object';
