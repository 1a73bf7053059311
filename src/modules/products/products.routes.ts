import express from 'express';
import { ProductsController } from './products.controller';

export const createProductsRoutes = (controller: ProductsController) => {
  const router = express.Router();

  router.get('/search', controller.searchProducts);
  router.get('/suggestions', controller.getSuggestions);
  router.get('/filter-options', controller.getFilterOptions);
  router.get('/stats', controller.getStats);
  router.post('/bulk', controller.bulkOperation);
  router.post('/check-sku', controller.checkSkuUniqueness);
  router.post('/check-ean', controller.checkEanUniqueness);
  router.post('/', controller.createProduct);
  router.get('/:id', controller.getProductById);
  router.put('/:id', controller.updateProduct);
  router.delete('/:id', controller.deleteProduct);
  router.post('/:id/archive', controller.archiveProduct);
  router.post('/:id/unarchive', controller.unarchiveProduct);

  return router;
};
