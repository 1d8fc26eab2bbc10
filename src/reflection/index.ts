export type { Invoker } from './invoker';
export { GetFieldInvoker, SetFieldInvoker, MethodInvoker } from './invoker';
export { Reflector } from './reflector';
export type { ReflectorFactory } from './reflector-factory';
export { DefaultReflectorFactory } from './reflector-factory';
export { MetaClass, elementTypeOf } from './meta-class';
