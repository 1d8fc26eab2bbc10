import { InvalidTokenError } from './errors';

export interface TokenHandler {
  handleToken(content: string): string;
}

/**
 * Replaces every `open…close` span of a text with what the handler makes of its content.
 *
 * A backslash right before an open or close token makes it literal (the backslash is
 * dropped). An open token that is never closed is copied through unchanged, along with
 * the rest of the text.
 */
export class GenericTokenParser {
  constructor(
    private readonly openToken: string,
    private readonly closeToken: string,
    private readonly handler: TokenHandler,
  ) {
    if (!openToken) {
      throw new InvalidTokenError('Open token must not be empty', openToken);
    }
    if (!closeToken) {
      throw new InvalidTokenError('Close token must not be empty', closeToken);
    }
  }

  parse(text: string | null | undefined): string {
    if (!text) {
      return '';
    }
    let start = text.indexOf(this.openToken);
    if (start === -1) {
      return text;
    }

    let offset = 0;
    let builder = '';
    while (start > -1) {
      if (start > 0 && text[start - 1] === '\\') {
        // Escaped open token: drop the backslash, keep the token
        builder += text.substring(offset, start - 1) + this.openToken;
        offset = start + this.openToken.length;
      } else {
        builder += text.substring(offset, start);
        offset = start + this.openToken.length;

        let expression = '';
        let end = text.indexOf(this.closeToken, offset);
        while (end > -1) {
          if (end > offset && text[end - 1] === '\\') {
            expression += text.substring(offset, end - 1) + this.closeToken;
            offset = end + this.closeToken.length;
            end = text.indexOf(this.closeToken, offset);
          } else {
            expression += text.substring(offset, end);
            break;
          }
        }

        if (end === -1) {
          builder += text.substring(start);
          offset = text.length;
        } else {
          builder += this.handler.handleToken(expression);
          offset = end + this.closeToken.length;
        }
      }
      start = text.indexOf(this.openToken, offset);
    }
    if (offset < text.length) {
      builder += text.substring(offset);
    }
    return builder;
  }
}
