export { PropertyTokenizer, tokenize } from './tokenizer';
export { PropertyNamer } from './property-namer';
