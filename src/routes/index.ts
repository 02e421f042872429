import express from 'express';
import { RequestHandler } from 'express';
import { createCartRouter } from '../modules/cart/cart.routes';
import { CartService } from '../modules/cart/cart.service';
import { createCategoriesRouter } from '../modules/categories/categories.routes';
import { CategoriesService } from '../modules/categories/categories.service';
import { createProductsRouter } from '../modules/products/products.routes';
import { ProductsService } from '../modules/products/products.service';
import { createReviewsRouter } from '../modules/reviews/reviews.routes';
import { ReviewsService } from '../modules/reviews/reviews.service';
import { createUsersRouter } from '../modules/users/users.routes';
import { UsersService } from '../modules/users/users.service';

export interface Services {
  users: UsersService;
  categories: CategoriesService;
  products: ProductsService;
  reviews: ReviewsService;
  cart: CartService;
}

export interface RouteGuards {
  authenticate: RequestHandler;
  loginLimiter: RequestHandler;
}

export const createApiRouter = (services: Services, guards: RouteGuards) => {
  const router = express.Router();

  router.use('/users', createUsersRouter(services.users, guards.loginLimiter));
  router.use('/categories', createCategoriesRouter(services.categories, guards.authenticate));
  router.use('/products', createProductsRouter(services.products, guards.authenticate));
  router.use('/reviews', createReviewsRouter(services.reviews, guards.authenticate));
  router.use('/cart', createCartRouter(services.cart, guards.authenticate));

  return router;
};
