import { TypeDescriptor } from '../type-model';

/**
 * Creates the objects the navigator needs when it walks through an absent
 * intermediate property
 */
export interface ObjectFactory {
  /**
   * @param constructorArgTypes declared types of `constructorArgs`, used in error reports
   */
  create(
    type: TypeDescriptor,
    constructorArgTypes?: readonly TypeDescriptor[],
    constructorArgs?: readonly unknown[],
  ): unknown;

  isCollection(type: TypeDescriptor): boolean;
}
