// Product Model - Based on migration create_products_table

export interface Product {
  id: number;
  name: string;
  description: string | null;
  price: string; // NUMERIC(10,2), pg returns decimals as strings
  image_url: string | null;
  stock: number; // >= 0
  is_active: boolean; // default: true
  category_id: number;
  seller_id: number;
  rating: number; // mean grade of active reviews, default: 0
  created_at: Date;
  updated_at: Date;
}

export interface ProductInput {
  name: string;
  description: string | null;
  price: number;
  stock: number;
  category_id: number;
  image_url: string | null;
}

export interface CreateProductInput extends ProductInput {
  seller_id: number;
}
