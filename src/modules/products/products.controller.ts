import { Request, Response } from 'express';
import { ZodError } from 'zod';
import { ResponseHandler } from '../../utils/response';
import { parseLogoBarcodes } from '../../utils/logo-barcodes';
import { CategoryRepository } from '../categories/categories.repository';
import { ProductSearchService } from '../search/search.service';
import { SuggestionService } from '../search/suggestion.service';
import { BulkService } from './bulk.service';
import { collectCatalogStats, collectFilterOptions } from './filter-options';
import { ProductRepository, UniqueProductField } from './products.repository';
import { ProductService } from './products.service';
import {
  bulkRequestSchema,
  criteriaQuerySchema,
  eanCheckSchema,
  productBodySchema,
  skuCheckSchema,
  suggestQuerySchema,
} from './products.validation';
import { idParamSchema } from '../../utils/validation';

export interface ProductsControllerDeps {
  productRepository: ProductRepository;
  categoryRepository: CategoryRepository;
  productService: ProductService;
  searchService: ProductSearchService;
  suggestionService: SuggestionService;
  bulkService: BulkService;
}

const handleError = (res: Response, error: unknown, message: string): Response => {
  if (error instanceof ZodError) {
    return ResponseHandler.validationError(res, error.issues);
  }
  return ResponseHandler.internalError(res, message, error);
};

const DUPLICATE_MESSAGES: Record<UniqueProductField, string> = {
  sku: 'SKU is already used by another product',
  ean_code: 'EAN code is already used by another product',
};

export const createProductsController = (deps: ProductsControllerDeps) => {
  // Advanced search: filters, sort and pagination
  const searchProducts = async (req: Request, res: Response) => {
    try {
      const criteria = criteriaQuerySchema.parse(req.query);
      const result = await deps.searchService.search(criteria);

      return ResponseHandler.success(res, result);
    } catch (error) {
      return handleError(res, error, 'Product search failed');
    }
  };

  // Autocomplete; never fails, degrades to an empty list
  const getSuggestions = async (req: Request, res: Response) => {
    const parsed = suggestQuerySchema.safeParse(req.query);
    const suggestions = parsed.success ? await deps.suggestionService.suggest(parsed.data.query) : [];

    return ResponseHandler.success(res, suggestions);
  };

  const bulkOperation = async (req: Request, res: Response) => {
    try {
      const { action, productIds } = bulkRequestSchema.parse(req.body);
      const result = await deps.bulkService.apply(action, productIds);

      return ResponseHandler.success(
        res,
        result,
        `Operation completed. Succeeded: ${result.successCount}, failed: ${result.failCount}`
      );
    } catch (error) {
      return handleError(res, error, 'Bulk operation failed');
    }
  };

  const getFilterOptions = async (_req: Request, res: Response) => {
    try {
      const products = await deps.productRepository.fetchAll();
      return ResponseHandler.success(res, collectFilterOptions(products));
    } catch (error) {
      return handleError(res, error, 'Failed to load filter options');
    }
  };

  const getStats = async (_req: Request, res: Response) => {
    try {
      const [products, totalCategories] = await Promise.all([
        deps.productRepository.fetchAll(),
        deps.categoryRepository.count(),
      ]);
      return ResponseHandler.success(res, collectCatalogStats(products, totalCategories));
    } catch (error) {
      return handleError(res, error, 'Failed to load catalog statistics');
    }
  };

  const getProductById = async (req: Request, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const product = await deps.productRepository.findById(id);

      if (!product) {
        return ResponseHandler.notFound(res, 'Product not found');
      }

      return ResponseHandler.success(res, {
        ...product,
        logo_barcode_list: parseLogoBarcodes(product.logo_barcodes),
      });
    } catch (error) {
      return handleError(res, error, 'Failed to load product');
    }
  };

  const createProduct = async (req: Request, res: Response) => {
    try {
      const fields = productBodySchema.parse(req.body);

      const duplicates = await deps.productService.duplicateFields(fields);
      if (duplicates.length > 0) {
        return ResponseHandler.conflict(res, DUPLICATE_MESSAGES[duplicates[0]], duplicates);
      }

      const product = await deps.productService.create(fields);
      return ResponseHandler.created(res, product, 'Product created');
    } catch (error) {
      return handleError(res, error, 'Failed to create product');
    }
  };

  const updateProduct = async (req: Request, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const fields = productBodySchema.parse(req.body);

      const duplicates = await deps.productService.duplicateFields(fields, id);
      if (duplicates.length > 0) {
        return ResponseHandler.conflict(res, DUPLICATE_MESSAGES[duplicates[0]], duplicates);
      }

      const product = await deps.productService.update(id, fields);
      if (!product) {
        return ResponseHandler.notFound(res, 'Product not found');
      }

      return ResponseHandler.success(res, product, 'Product updated');
    } catch (error) {
      return handleError(res, error, 'Failed to update product');
    }
  };

  const setArchived = (archived: boolean) => async (req: Request, res: Response) => {
    const verb = archived ? 'archive' : 'unarchive';
    try {
      const { id } = idParamSchema.parse(req.params);
      const outcome = await deps.productService.setArchived(id, archived);

      switch (outcome.status) {
        case 'not_found':
          return ResponseHandler.notFound(res, 'Product not found');
        case 'unchanged':
          return ResponseHandler.conflict(res, archived ? 'Product is already archived' : 'Product is not archived');
        case 'updated':
          return ResponseHandler.success(res, outcome.product, `Product ${verb}d`);
      }
    } catch (error) {
      return handleError(res, error, `Failed to ${verb} product`);
    }
  };

  const deleteProduct = async (req: Request, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const deleted = await deps.productService.remove(id);

      if (!deleted) {
        return ResponseHandler.notFound(res, 'Product not found');
      }

      return ResponseHandler.success(res, null, 'Product deleted');
    } catch (error) {
      return handleError(res, error, 'Failed to delete product');
    }
  };

  const checkSkuUniqueness = async (req: Request, res: Response) => {
    try {
      const { sku, excludeProductId } = skuCheckSchema.parse(req.body);
      const isUnique = await deps.productService.isUnique('sku', sku, excludeProductId);
      return ResponseHandler.success(res, { isUnique });
    } catch (error) {
      return handleError(res, error, 'SKU uniqueness check failed');
    }
  };

  const checkEanUniqueness = async (req: Request, res: Response) => {
    try {
      const { eanCode, excludeProductId } = eanCheckSchema.parse(req.body);
      const isUnique = await deps.productService.isUnique('ean_code', eanCode, excludeProductId);
      return ResponseHandler.success(res, { isUnique });
    } catch (error) {
      return handleError(res, error, 'EAN uniqueness check failed');
    }
  };

  return {
    createProduct,
    updateProduct,
    archiveProduct: setArchived(true),
    unarchiveProduct: setArchived(false),
    deleteProduct,
    checkSkuUniqueness,
    checkEanUniqueness,
    searchProducts,
    getSuggestions,
    bulkOperation,
    getFilterOptions,
    getStats,
    getProductById,
  };
};

export type ProductsController = ReturnType<typeof createProductsController>;
