export { authService, AuthService } from './auth.service';
export { AuthController } from './auth.controller';
export { createAuthAdminRoutes } from './auth.routes';
export { authMiddleware, requireUserId } from './auth.middleware';
export { AuthRequest, AuthContext, IssuedToken, JWTPayload } from './auth.types';
