// CartItem Model - Based on migration create_cart_items_table

export interface CartItem {
  id: number;
  user_id: number;
  product_id: number;
  quantity: number; // >= 1, UNIQUE(user_id, product_id)
  created_at: Date;
  updated_at: Date;
}

/**
 * Product columns joined onto a cart line at read time
 */
export interface CartProductSnapshot {
  id: number;
  name: string;
  price: string | null;
  image_url: string | null;
  stock: number;
  is_active: boolean;
}

export interface CartLine extends CartItem {
  product: CartProductSnapshot;
}
