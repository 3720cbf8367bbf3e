import { Request } from 'express';

export interface JWTPayload {
  userId: string;
  iat?: number;
  exp?: number;
}

export interface AuthContext {
  userId: string;
}

export interface AuthRequest extends Request {
  auth?: AuthContext;
}

export interface IssuedToken {
  userId: string;
  token: string;
  tokenType: 'Bearer';
  /** Seconds until the token expires */
  expiresIn: number;
}
