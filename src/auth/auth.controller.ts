import { Request, Response, NextFunction } from 'express';

import { AuthService } from './auth.service';

export class AuthController {
  constructor(private readonly auth: AuthService) {}

  /**
   * Issue a player token on behalf of a trusted backend
   * POST /admin/users/:userId/issue_token
   */
  async issueToken(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const issued = this.auth.issueToken(req.params.userId);

      res.status(200).json({
        success: true,
        data: issued,
      });
    } catch (error) {
      next(error);
    }
  }
}
