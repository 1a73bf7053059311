import { MigrationInfo } from './types';

import * as migration001 from './20251120_000001_create_categories_table';
import * as migration002 from './20251120_000002_create_products_table';

export const migrations: MigrationInfo[] = [
  { name: '20251120_000001_create_categories_table', migration: migration001.migration },
  { name: '20251120_000002_create_products_table', migration: migration002.migration },
];
