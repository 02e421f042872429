// Review Model - Based on migration create_reviews_table

export interface Review {
  id: number;
  user_id: number;
  product_id: number;
  comment: string | null; // up to 1000 chars
  comment_date: Date; // creation or last edit
  grade: number; // 1..5
  is_active: boolean; // default: true; soft delete clears it, never set back
}

export interface CreateReviewInput {
  user_id: number;
  product_id: number;
  comment: string | null;
  grade: number;
}

export interface UpdateReviewInput {
  comment: string | null;
  grade: number;
}
