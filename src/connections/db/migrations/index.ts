import { MigrationInfo } from './types';

import * as migration001 from './20250301_000001_create_users_table';
import * as migration002 from './20250301_000002_create_categories_table';
import * as migration003 from './20250301_000003_create_products_table';
import * as migration004 from './20250301_000004_create_reviews_table';
import * as migration005 from './20250301_000005_create_cart_items_table';

export const migrations: MigrationInfo[] = [
  { name: '20250301_000001_create_users_table', migration: migration001.migration },
  { name: '20250301_000002_create_categories_table', migration: migration002.migration },
  { name: '20250301_000003_create_products_table', migration: migration003.migration },
  { name: '20250301_000004_create_reviews_table', migration: migration004.migration },
  { name: '20250301_000005_create_cart_items_table', migration: migration005.migration },
];
