export type { ProductService } from './ProductService.js';
export { ProductServiceImpl } from './ProductServiceImpl.js';
