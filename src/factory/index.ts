export type { ObjectFactory } from './object-factory';
export { DefaultObjectFactory } from './default-object-factory';
