import jwt, { SignOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { createServiceLogger } from '../observability/logger';
import { isValidIdentifier } from '../services/currency/currency.types';

import { IssuedToken, JWTPayload } from './auth.types';

const log = createServiceLogger('auth');

/**
 * Verifies player bearer tokens, and issues them for the admin API
 */
export class AuthService {
  constructor(
    private readonly secret: string = config.jwt.secret,
    private readonly ttlSeconds: number = config.jwt.accessTokenTtlSeconds
  ) {}

  generateToken(userId: string, expiresIn: SignOptions['expiresIn'] = this.ttlSeconds): string {
    const payload: JWTPayload = { userId };
    return jwt.sign(payload, this.secret, { expiresIn });
  }

  /**
   * Token for a player, requested by a trusted backend holding the API key
   */
  issueToken(userId: string): IssuedToken {
    if (!isValidIdentifier(userId)) {
      throw ApiError.validationError(`invalid user id: ${userId}`);
    }

    const token = this.generateToken(userId);
    log.info({ userId, expiresIn: this.ttlSeconds }, 'Token issued');

    return { userId, token, tokenType: 'Bearer', expiresIn: this.ttlSeconds };
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    const userId: unknown = typeof decoded === 'string' ? undefined : decoded.userId ?? decoded.sub;
    if (typeof userId !== 'string' || !isValidIdentifier(userId)) {
      throw ApiError.invalidToken('Token does not identify a user');
    }

    return {
      userId,
      iat: typeof decoded === 'string' ? undefined : decoded.iat,
      exp: typeof decoded === 'string' ? undefined : decoded.exp,
    };
  }
}

export const authService = new AuthService();
