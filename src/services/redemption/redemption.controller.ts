import { Request, Response, NextFunction } from 'express';

import { requireUserId } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { RedemptionService } from './redemption.service';

const optionalNumber = (value: unknown): number | undefined =>
  typeof value === 'number' ? value : undefined;

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value !== '' ? value : undefined;

const requireDate = (value: unknown, field: string): Date => {
  if (!(value instanceof Date)) {
    throw ApiError.validationError(`${field} must be a date`);
  }
  return value;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export class RedemptionController {
  constructor(private readonly redemptionService: RedemptionService) {}

  /**
   * Redeem a code for the authenticated user
   * POST /codes/redeem
   */
  async redeem(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      const code = String(req.body.code);

      const result = await this.redemptionService.redeem(
        { code, userId },
        { signal: AbortSignal.timeout(config.redemption.requestTimeoutMs) }
      );

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/codes
   */
  async createCode(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { body } = req;
      const code = await this.redemptionService.createCode({
        code: String(body.code),
        codeType: String(body.codeType),
        currencyKind: String(body.currencyKind),
        amount: Number(body.amount),
        maxUses: optionalNumber(body.maxUses),
        validFrom: requireDate(body.validFrom, 'validFrom'),
        validUntil: requireDate(body.validUntil, 'validUntil'),
        metadata: isRecord(body.metadata) ? body.metadata : undefined,
      });

      res.status(201).json({
        success: true,
        data: { code },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/codes
   */
  async listCodes(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.redemptionService.listCodes({
        limit: optionalNumber(req.query.limit),
        offset: optionalNumber(req.query.offset),
        status: optionalString(req.query.status),
        codeType: optionalString(req.query.codeType),
      });

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/codes/:code
   */
  async getCode(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const code = await this.redemptionService.getCode(req.params.code);

      res.status(200).json({
        success: true,
        data: { code },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /admin/codes/:code
   */
  async deleteCode(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await this.redemptionService.deleteCode(req.params.code);

      res.status(200).json({
        success: true,
        data: { code: req.params.code.trim(), deleted: true },
      });
    } catch (error) {
      next(error);
    }
  }
}
