// Category Model - Based on migration create_categories_table

export interface Category {
  id: number;
  name: string;
  parent_id: number | null; // NULL = root category
  is_active: boolean; // default: true
}

export interface CategoryInput {
  name: string;
  parent_id: number | null;
}
