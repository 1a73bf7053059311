import express from 'express';
import { CategoriesController } from './categories.controller';

export const createCategoriesRoutes = (controller: CategoriesController) => {
  const router = express.Router();

  router.get('/', controller.getCategories);
  router.post('/', controller.createCategory);
  router.get('/:id', controller.getCategoryById);
  router.put('/:id', controller.updateCategory);
  router.patch('/:id', controller.quickEditCategory);
  router.delete('/:id', controller.deleteCategory);

  return router;
};
