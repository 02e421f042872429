import { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import { UsersService } from './users.service';
import { loginSchema, refreshTokenSchema, registerSchema } from './users.validation';

export const createUsersController = (users: UsersService) => ({
  register: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validated = registerSchema.parse(req.body);
      const user = await users.register(validated);
      return ResponseHandler.created(res, user, 'Registered');
    } catch (error) {
      next(error);
    }
  },

  login: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validated = loginSchema.parse(req.body);
      const tokens = await users.login(validated);
      return ResponseHandler.success(res, tokens, 'Logged in');
    } catch (error) {
      next(error);
    }
  },

  refreshToken: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { refresh_token } = refreshTokenSchema.parse(req.body);
      const token = await users.refresh(refresh_token);
      return ResponseHandler.success(res, token, 'Token refreshed');
    } catch (error) {
      next(error);
    }
  },
});
