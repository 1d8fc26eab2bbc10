export * from './base';
export * from './codes';
