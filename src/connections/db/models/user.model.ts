// User Model - Based on migration create_users_table

export const USER_ROLES = ['buyer', 'seller', 'admin'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export interface User {
  id: number;
  email: string; // unique
  hashed_password: string;
  role: UserRole;
  is_active: boolean; // default: true
  created_at: Date;
}

export interface CreateUserInput {
  email: string;
  hashed_password: string;
  role: UserRole;
}

// What leaves the API - never the password hash
export type PublicUser = Omit<User, 'hashed_password'>;
