export type { ObjectWrapper } from './object-wrapper';
export { isObjectWrapper } from './object-wrapper';
export { BaseWrapper, isPlainObject, parseIndex } from './base-wrapper';
export { BeanWrapper } from './bean-wrapper';
export { MapWrapper } from './map-wrapper';
export type { MapLike } from './map-wrapper';
export { CollectionWrapper } from './collection-wrapper';
export type { ObjectWrapperFactory } from './object-wrapper-factory';
export { DefaultObjectWrapperFactory } from './object-wrapper-factory';
