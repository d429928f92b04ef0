export { CatalogService, type CreateOrderInput, type CreateProductInput } from './catalog.service';
