import { z } from 'zod';
import { nullableText } from '../../utils/validation';

const categoryName = z.string().trim().min(1, 'Category name is required').max(100, 'Category name is too long');

// Full edit (POST /categories, PUT /categories/:id)
export const categoryBodySchema = z.object({
  name: categoryName,
  description: nullableText(500),
  is_active: z.boolean().optional(),
});

// Inline rename from the listing (PATCH /categories/:id)
export const quickEditSchema = z.object({
  name: categoryName,
  description: nullableText(500),
});
