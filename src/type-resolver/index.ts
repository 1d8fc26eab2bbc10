export { TypeParameterResolver } from './resolver';
