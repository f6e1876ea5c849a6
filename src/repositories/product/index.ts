export type { ProductRepository } from './ProductRepository.js';
export { ProductRepositoryImpl } from './ProductRepositoryImpl.js';
export * from './types.js';
