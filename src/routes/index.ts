import express from 'express';
import { Pool } from 'pg';
import { createCategoriesController } from '../modules/categories/categories.controller';
import { PgCategoryRepository } from '../modules/categories/categories.repository';
import { createCategoriesRoutes } from '../modules/categories/categories.routes';
import { BulkService } from '../modules/products/bulk.service';
import { createProductsController } from '../modules/products/products.controller';
import { PgProductRepository } from '../modules/products/products.repository';
import { createProductsRoutes } from '../modules/products/products.routes';
import { ProductService } from '../modules/products/products.service';
import { ProductSearchService } from '../modules/search/search.service';
import { SuggestionService } from '../modules/search/suggestion.service';

export const createApiRoutes = (pool: Pool) => {
  const router = express.Router();

  const productRepository = new PgProductRepository(pool);
  const categoryRepository = new PgCategoryRepository(pool);
  const productService = new ProductService(productRepository);
  const searchService = new ProductSearchService(productRepository);

  const productsController = createProductsController({
    productRepository,
    categoryRepository,
    productService,
    searchService,
    suggestionService: new SuggestionService(searchService),
    bulkService: new BulkService(productService),
  });

  // API Routes
  router.use('/products', createProductsRoutes(productsController));
  router.use('/categories', createCategoriesRoutes(createCategoriesController(categoryRepository)));

  return router;
};
