import { Request } from 'express';
import { UserRole } from '../connections/db/models/user.model';

/**
 * Authenticated caller, resolved from the bearer token
 */
export interface Principal {
  id: number;
  email: string;
  role: UserRole;
}

/**
 * Request carrying the principal once `authenticate` has run
 */
export interface AuthRequest extends Request {
  user?: Principal;
}
