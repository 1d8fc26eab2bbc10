/**
 * The first segment of a property path, plus whatever follows it.
 *
 * Examples:
 * "order.items[0].price" -> name 'order', children 'items[0].price'
 * "items[0].price" -> name 'items', index '0', indexedName 'items[0]', children 'price'
 * "map[a.b]" -> name 'map', index 'a.b' (dots inside brackets do not split)
 *
 * Malformed input never throws. A segment whose bracket is not closed at the end is
 * kept whole as the name.
 */
export class PropertyTokenizer implements Iterable<PropertyTokenizer> {
  readonly name: string;
  readonly indexedName: string;
  readonly index: string | undefined;
  readonly children: string | undefined;

  constructor(fullname: string) {
    const delim = findSegmentEnd(fullname);
    if (delim > -1) {
      this.name = fullname.substring(0, delim);
      this.children = fullname.substring(delim + 1);
    } else {
      this.name = fullname;
      this.children = undefined;
    }
    this.indexedName = this.name;

    const open = this.name.indexOf('[');
    if (open > -1 && this.name.endsWith(']')) {
      this.index = this.name.substring(open + 1, this.name.length - 1);
      this.name = this.name.substring(0, open);
    } else {
      this.index = undefined;
    }
  }

  hasNext(): boolean {
    return this.children !== undefined;
  }

  /**
   * The tokenizer for the remainder of the path, if any
   */
  next(): PropertyTokenizer | undefined {
    return this.children === undefined ? undefined : new PropertyTokenizer(this.children);
  }

  *[Symbol.iterator](): Iterator<PropertyTokenizer> {
    let current: PropertyTokenizer | undefined = this;
    while (current) {
      yield current;
      current = current.next();
    }
  }

  /**
   * Writes the path back out as `name[index].children`
   */
  toString(): string {
    const indexed = this.index === undefined ? this.name : `${this.name}[${this.index}]`;
    return this.children === undefined ? indexed : `${indexed}.${this.children}`;
  }
}

export function tokenize(path: string): PropertyTokenizer {
  return new PropertyTokenizer(path);
}

/**
 * Position of the first '.' outside brackets, or -1
 */
function findSegmentEnd(path: string): number {
  let depth = 0;
  for (let i = 0; i < path.length; i++) {
    const char = path[i];
    if (char === '[') {
      depth++;
    } else if (char === ']' && depth > 0) {
      depth--;
    } else if (char === '.' && depth === 0) {
      return i;
    }
  }
  return -1;
}
