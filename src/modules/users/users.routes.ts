import express from 'express';
import { RequestHandler } from 'express';
import { createUsersController } from './users.controller';
import { UsersService } from './users.service';

export const createUsersRouter = (users: UsersService, loginLimiter: RequestHandler) => {
  const router = express.Router();
  const controller = createUsersController(users);

  router.post('/', controller.register);
  router.post('/token', loginLimiter, controller.login);
  router.post('/refresh-token', controller.refreshToken);

  return router;
};
