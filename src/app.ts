import express from 'express';
import cors from 'cors';
import { CorsOptions } from 'cors';
import { appConfig } from './connections/config/app.config';
import { UnitOfWork } from './connections/db/unit-of-work';
import { createAuthenticate } from './middlewares/auth.middleware';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { createLoginLimiter } from './middlewares/rateLimit.middleware';
import { CartService } from './modules/cart/cart.service';
import { CategoriesService } from './modules/categories/categories.service';
import { ProductsService } from './modules/products/products.service';
import { ReviewsService } from './modules/reviews/reviews.service';
import { MEDIA_ROUTE } from './modules/upload/localStorage.service';
import { MediaStorage } from './modules/upload/storage.service';
import { UsersService, UsersServiceOptions } from './modules/users/users.service';
import { createApiRouter } from './routes';
import { logger } from './utils/logging';
import { ResponseHandler } from './utils/response';

export interface AppDependencies {
  uow: UnitOfWork;
  storage: MediaStorage;
  /** Directory served under /media */
  mediaDir?: string;
  auth?: Partial<UsersServiceOptions>;
}

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Requests without an Origin header (curl, server to server)
    if (!origin) {
      return callback(null, true);
    }

    if (appConfig.corsOrigins.includes(origin)) {
      return callback(null, true);
    }

    // Development without an explicit list allows everything
    if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      return callback(null, true);
    }

    callback(null, false);
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'Origin'],
  exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
  maxAge: 86400,
};

export const createApp = ({ uow, storage, mediaDir = appConfig.uploadDir, auth }: AppDependencies) => {
  const app = express();

  const users = new UsersService(uow, auth);
  const services = {
    users,
    categories: new CategoriesService(uow),
    products: new ProductsService(uow, storage),
    reviews: new ReviewsService(uow),
    cart: new CartService(uow),
  };

  app.use(cors(corsOptions));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/', (_req, res) => {
    ResponseHandler.success(res, { name: 'storefront-api' }, 'Welcome to the storefront API');
  });

  app.get('/health', async (_req, res) => {
    try {
      await uow.ping();
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.error('[Health] Database unreachable', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  app.use(MEDIA_ROUTE, express.static(mediaDir));

  app.use('/api', createApiRouter(services, {
    authenticate: createAuthenticate(users),
    loginLimiter: createLoginLimiter(),
  }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
