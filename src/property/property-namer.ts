import { ReflectionError, ErrorCode } from '../errors';

/**
 * Bean naming conventions: `getName()`, `isActive()` and `setName(value)`
 */
export class PropertyNamer {
  static methodToProperty(name: string): string {
    let property: string;
    if (name.startsWith('is')) {
      property = name.substring(2);
    } else if (name.startsWith('get') || name.startsWith('set')) {
      property = name.substring(3);
    } else {
      throw new ReflectionError(
        `Error parsing property name '${name}'. Didn't start with 'is', 'get' or 'set'.`,
        ErrorCode.INVALID_METHOD_NAME,
        { method: name },
      );
    }

    // URL stays URL, Name becomes name
    if (property.length === 1 || (property.length > 1 && !isUpperCase(property.charAt(1)))) {
      property = property.charAt(0).toLowerCase() + property.substring(1);
    }
    return property;
  }

  static isProperty(name: string): boolean {
    return this.isGetter(name) || this.isSetter(name);
  }

  static isGetter(name: string): boolean {
    return (name.startsWith('get') && name.length > 3) || (name.startsWith('is') && name.length > 2);
  }

  static isSetter(name: string): boolean {
    return name.startsWith('set') && name.length > 3;
  }
}

function isUpperCase(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}
