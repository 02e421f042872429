import { Response, NextFunction } from 'express';
import { UserRole } from '../connections/db/models/user.model';
import { UsersService } from '../modules/users/users.service';
import { AuthRequest, Principal } from '../types/request.types';
import { AppError, UnauthenticatedError } from '../utils/errors';
import { ResponseHandler } from '../utils/response';

const bearerToken = (req: AuthRequest): string | null => {
  const [scheme, token] = (req.headers.authorization ?? '').split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : null;
};

export const createAuthenticate = (users: UsersService) => {
  return async (req: AuthRequest, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      return ResponseHandler.unauthorized(res, 'Token not provided');
    }

    try {
      req.user = await users.authenticate(token);
    } catch (error) {
      if (error instanceof AppError) {
        return ResponseHandler.unauthorized(res, error.message);
      }
      return next(error);
    }

    next();
  };
};

export const requireRole = (...roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res, 'Not authenticated');
    }

    if (!roles.includes(req.user.role)) {
      return ResponseHandler.forbidden(res, 'Insufficient role');
    }

    next();
  };
};

/**
 * Principal of a request that went through `authenticate`
 */
export const principalOf = (req: AuthRequest): Principal => {
  if (!req.user) {
    throw new UnauthenticatedError();
  }
  return req.user;
};
