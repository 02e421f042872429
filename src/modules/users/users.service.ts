import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { appConfig } from '../../connections/config/app.config';
import { UnitOfWork } from '../../connections/db/unit-of-work';
import { PublicUser, User, USER_ROLES } from '../../connections/db/models/user.model';
import { Principal } from '../../types/request.types';
import { ConflictError, UnauthenticatedError } from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import { LoginInput, RegisterInput } from './users.validation';

export interface TokenPair {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
}

export interface AccessToken {
  access_token: string;
  token_type: 'bearer';
}

export interface UsersServiceOptions {
  secret: string;
  /** Seconds */
  accessTokenTtl: number;
  /** Seconds */
  refreshTokenTtl: number;
  saltRounds: number;
}

const tokenPayloadSchema = z.object({
  userId: z.number().int().positive(),
  role: z.enum(USER_ROLES),
  type: z.literal('refresh').optional(),
});

type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export const toPublicUser = ({ hashed_password: _hash, ...user }: User): PublicUser => user;

export class UsersService {
  private readonly options: UsersServiceOptions;

  constructor(
    private readonly uow: UnitOfWork,
    options: Partial<UsersServiceOptions> = {}
  ) {
    this.options = {
      secret: appConfig.jwtSecret,
      accessTokenTtl: appConfig.jwtExpiresIn,
      refreshTokenTtl: appConfig.jwtRefreshExpiresIn,
      saltRounds: 10,
      ...options,
    };
  }

  async register(input: RegisterInput): Promise<PublicUser> {
    const hashed_password = await bcrypt.hash(input.password, this.options.saltRounds);

    const user = await this.uow.run(async ({ users }) => {
      if (await users.findByEmail(input.email)) {
        throw new ConflictError('Email already registered');
      }
      return users.create({ email: input.email, hashed_password, role: input.role });
    });

    auditLog('USER_REGISTERED', { userId: user.id, email: user.email, role: user.role });
    return toPublicUser(user);
  }

  async login(input: LoginInput): Promise<TokenPair> {
    const user = await this.uow.run(({ users }) => users.findByEmail(input.email));

    if (!user || !user.is_active) {
      logger.warn('[Login] Unknown or inactive account', { email: input.email });
      throw new UnauthenticatedError('Incorrect email or password');
    }

    if (!(await bcrypt.compare(input.password, user.hashed_password))) {
      logger.warn('[Login] Invalid password', { userId: user.id });
      throw new UnauthenticatedError('Incorrect email or password');
    }

    auditLog('USER_LOGIN', { userId: user.id, email: user.email });

    return {
      access_token: this.signAccessToken(user),
      refresh_token: this.signRefreshToken(user),
      token_type: 'bearer',
    };
  }

  async refresh(refreshToken: string): Promise<AccessToken> {
    const payload = this.verify(refreshToken);
    if (payload.type !== 'refresh') {
      throw new UnauthenticatedError('Not a refresh token');
    }

    const user = await this.uow.run(({ users }) => users.findActiveById(payload.userId));
    if (!user) {
      throw new UnauthenticatedError('User not found or inactive');
    }

    logger.info('[RefreshToken] Token refreshed', { userId: user.id });
    return { access_token: this.signAccessToken(user), token_type: 'bearer' };
  }

  /**
   * Resolves an access token to the principal of an active user
   */
  async authenticate(accessToken: string): Promise<Principal> {
    const payload = this.verify(accessToken);
    if (payload.type === 'refresh') {
      throw new UnauthenticatedError('Refresh tokens cannot authorize requests');
    }

    const user = await this.uow.run(({ users }) => users.findActiveById(payload.userId));
    if (!user) {
      throw new UnauthenticatedError('User not found or inactive');
    }

    return { id: user.id, email: user.email, role: user.role };
  }

  private signAccessToken(user: User): string {
    return jwt.sign({ userId: user.id, role: user.role }, this.options.secret, {
      expiresIn: this.options.accessTokenTtl,
    });
  }

  private signRefreshToken(user: User): string {
    return jwt.sign({ userId: user.id, role: user.role, type: 'refresh' }, this.options.secret, {
      expiresIn: this.options.refreshTokenTtl,
    });
  }

  private verify(token: string): TokenPayload {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.options.secret);
    } catch (error) {
      const reason = error instanceof jwt.TokenExpiredError ? 'Token expired' : 'Invalid token';
      throw new UnauthenticatedError(reason);
    }

    const parsed = tokenPayloadSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new UnauthenticatedError('Invalid token');
    }
    return parsed.data;
  }
}
