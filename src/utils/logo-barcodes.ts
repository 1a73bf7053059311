import { z } from 'zod';

const barcodeArraySchema = z.array(z.string());

const cleanList = (values: string[]): string[] =>
  values.map(value => value.trim()).filter(value => value.length > 0);

/**
 * Reads the stored logo barcode list. Three historical formats exist and are
 * tried in this order: comma separated, JSON array, one barcode per line.
 * Anything unreadable yields an empty list.
 */
export const parseLogoBarcodes = (stored: string | null | undefined): string[] => {
  if (!stored || stored.trim().length === 0) return [];

  try {
    if (stored.includes(',')) {
      return cleanList(stored.split(','));
    }

    if (stored.trim().startsWith('[')) {
      return cleanList(barcodeArraySchema.parse(JSON.parse(stored)));
    }

    return cleanList(stored.split(/[\r\n]+/));
  } catch {
    return [];
  }
};

