import { Request, Response } from 'express';
import { ZodError } from 'zod';
import { CategoryFields } from '../../connections/db/models/category.model';
import { getLogger } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { idParamSchema } from '../../utils/validation';
import { CategoryRepository } from './categories.repository';
import { categoryBodySchema, quickEditSchema } from './categories.validation';

const log = getLogger('CategoriesController');

const handleError = (res: Response, error: unknown, message: string): Response => {
  if (error instanceof ZodError) {
    return ResponseHandler.validationError(res, error.issues);
  }
  return ResponseHandler.internalError(res, message, error);
};

export const createCategoriesController = (categoryRepository: CategoryRepository) => {
  // True when another category already has this name
  const nameTaken = async (name: string, exceptId?: number): Promise<boolean> => {
    const existing = await categoryRepository.findByName(name);
    return existing !== null && existing.id !== exceptId;
  };

  // Inactive categories are left out of the listing
  const getCategories = async (_req: Request, res: Response) => {
    try {
      const categories = await categoryRepository.findActive();
      return ResponseHandler.success(res, categories);
    } catch (error) {
      return ResponseHandler.internalError(res, 'Failed to load categories', error);
    }
  };

  const getCategoryById = async (req: Request, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const category = await categoryRepository.findById(id);

      if (!category) {
        return ResponseHandler.notFound(res, 'Category not found');
      }

      return ResponseHandler.success(res, category);
    } catch (error) {
      return handleError(res, error, 'Failed to load category');
    }
  };

  const createCategory = async (req: Request, res: Response) => {
    try {
      const fields = categoryBodySchema.parse(req.body);

      if (await nameTaken(fields.name)) {
        return ResponseHandler.conflict(res, 'Category already exists');
      }

      const category = await categoryRepository.create(fields);
      log.info('Category created', { categoryId: category.id, name: category.name });

      return ResponseHandler.created(res, category, `Category '${category.name}' created`);
    } catch (error) {
      return handleError(res, error, 'Failed to create category');
    }
  };

  const saveCategory = async (req: Request, res: Response, fields: CategoryFields) => {
    const { id } = idParamSchema.parse(req.params);

    if (await nameTaken(fields.name, id)) {
      return ResponseHandler.conflict(res, 'Category already exists');
    }

    const category = await categoryRepository.update(id, fields);
    if (!category) {
      return ResponseHandler.notFound(res, 'Category not found');
    }

    return ResponseHandler.success(res, category, `Category '${category.name}' updated`);
  };

  const updateCategory = async (req: Request, res: Response) => {
    try {
      return await saveCategory(req, res, categoryBodySchema.parse(req.body));
    } catch (error) {
      return handleError(res, error, 'Failed to update category');
    }
  };

  // Name and description only; the active flag is left as it is
  const quickEditCategory = async (req: Request, res: Response) => {
    try {
      return await saveCategory(req, res, quickEditSchema.parse(req.body));
    } catch (error) {
      return handleError(res, error, 'Failed to update category');
    }
  };

  // Refused while products still point at the category
  const deleteCategory = async (req: Request, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);

      const category = await categoryRepository.findById(id);
      if (!category) {
        return ResponseHandler.notFound(res, 'Category not found');
      }

      const productCount = await categoryRepository.countProducts(id);
      if (productCount > 0) {
        return ResponseHandler.badRequest(
          res,
          `Category is used by ${productCount} products; move or delete them first`
        );
      }

      await categoryRepository.delete(id);
      log.info('Category deleted', { categoryId: id });

      return ResponseHandler.success(res, null, 'Category deleted');
    } catch (error) {
      return handleError(res, error, 'Failed to delete category');
    }
  };

  return {
    getCategories,
    getCategoryById,
    createCategory,
    updateCategory,
    quickEditCategory,
    deleteCategory,
  };
};

export type CategoriesController = ReturnType<typeof createCategoriesController>;
