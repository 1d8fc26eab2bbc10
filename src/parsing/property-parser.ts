import {
  DEFAULT_CLOSE_TOKEN,
  DEFAULT_OPEN_TOKEN,
  DEFAULT_VALUE_SEPARATOR,
} from '../constants/defaults';
import { GenericTokenParser, TokenHandler } from './token-parser';

export interface PropertyParserOptions {
  /** Allow `${name:fallback}`. Off by default */
  enableDefaultValue?: boolean;
  defaultValueSeparator?: string;
}

/**
 * Substitutes `${name}` placeholders from a variables record.
 * Names the record does not hold are left as written.
 */
export class PropertyParser {
  static parse(
    text: string,
    variables?: Readonly<Record<string, unknown>>,
    options: PropertyParserOptions = {},
  ): string {
    const handler = new VariableTokenHandler(variables, options);
    return new GenericTokenParser(DEFAULT_OPEN_TOKEN, DEFAULT_CLOSE_TOKEN, handler).parse(text);
  }
}

class VariableTokenHandler implements TokenHandler {
  private readonly enableDefaultValue: boolean;
  private readonly defaultValueSeparator: string;

  constructor(
    private readonly variables: Readonly<Record<string, unknown>> | undefined,
    options: PropertyParserOptions,
  ) {
    this.enableDefaultValue = options.enableDefaultValue ?? false;
    this.defaultValueSeparator = options.defaultValueSeparator ?? DEFAULT_VALUE_SEPARATOR;
  }

  handleToken(content: string): string {
    if (this.variables) {
      let key = content;
      let defaultValue: string | undefined;
      if (this.enableDefaultValue) {
        const separatorIndex = content.indexOf(this.defaultValueSeparator);
        if (separatorIndex >= 0) {
          key = content.substring(0, separatorIndex);
          defaultValue = content.substring(separatorIndex + this.defaultValueSeparator.length);
        }
      }
      if (Object.prototype.hasOwnProperty.call(this.variables, key)) {
        return String(this.variables[key]);
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
    }
    return `${DEFAULT_OPEN_TOKEN}${content}${DEFAULT_CLOSE_TOKEN}`;
  }
}
