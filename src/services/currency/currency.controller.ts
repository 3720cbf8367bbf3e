import { Request, Response, NextFunction } from 'express';

import { requireUserId } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { config } from '../../config';
import { CurrencyService } from './currency.service';
import { ConsumeCurrencyRequest, isPriorityConsume } from './currency.types';

const optionalNumber = (value: unknown): number | undefined =>
  typeof value === 'number' ? value : undefined;

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value !== '' ? value : undefined;

const optionalRecord = (value: unknown): Record<string, unknown> | undefined =>
  typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;

const consumeRequest = (
  userId: string,
  body: Record<string, unknown>,
  requester: string | undefined
): ConsumeCurrencyRequest => ({
  userId,
  currencyKind: String(body.currencyKind),
  amount: Number(body.amount),
  usePriority: body.usePriority === true,
  itemId: optionalString(body.itemId),
  requester,
  metadata: optionalRecord(body.metadata),
});

/**
 * Player routes act on the authenticated user; admin routes on the `:userId` path parameter
 */
type UserSource = (req: AuthRequest) => string;

const fromToken: UserSource = requireUserId;
const fromPath: UserSource = (req) => req.params.userId;

export class CurrencyController {
  constructor(private readonly currencyService: CurrencyService) {}

  /**
   * GET /currency/balance
   */
  async getBalance(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.respondBalance(fromToken, req, res, next);
  }

  /**
   * GET /admin/users/:userId/balance
   */
  async getUserBalance(req: Request, res: Response, next: NextFunction): Promise<void> {
    await this.respondBalance(fromPath, req, res, next);
  }

  /**
   * Ledger history for the authenticated user
   * GET /currency/transactions
   */
  async getHistory(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    await this.respondHistory(fromToken, req, res, next);
  }

  /**
   * GET /admin/users/:userId/transactions
   */
  async getUserHistory(req: Request, res: Response, next: NextFunction): Promise<void> {
    await this.respondHistory(fromPath, req, res, next);
  }

  private async respondBalance(
    source: UserSource,
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const balance = await this.currencyService.getBalance(source(req));

      res.status(200).json({
        success: true,
        data: balance,
      });
    } catch (error) {
      next(error);
    }
  }

  private async respondHistory(
    source: UserSource,
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const history = await this.currencyService.getHistory(source(req), {
        limit: optionalNumber(req.query.limit),
        offset: optionalNumber(req.query.offset),
        currencyKind: optionalString(req.query.currencyKind),
        kind: optionalString(req.query.kind),
      });

      res.status(200).json({
        success: true,
        data: history,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /currency/transactions/:entryId
   */
  async getLedgerEntry(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const entry = await this.currencyService.getLedgerEntry(requireUserId(req), req.params.entryId);

      res.status(200).json({
        success: true,
        data: { entry },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Spend currency as the authenticated user
   * POST /currency/consume
   */
  async consume(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = requireUserId(req);
      await this.respondConsume(consumeRequest(userId, req.body, userId), res);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Spend currency on a user's behalf, e.g. for support corrections
   * POST /admin/users/:userId/consume
   */
  async consumeForUser(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { body } = req;
      await this.respondConsume(
        consumeRequest(req.params.userId, body, optionalString(body.requester)),
        res
      );
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/users/:userId/grant
   */
  async grantToUser(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await this.respondGrant(req.params.userId, req.body, res);
    } catch (error) {
      next(error);
    }
  }

  private async respondConsume(request: ConsumeCurrencyRequest, res: Response): Promise<void> {
    const options = { signal: AbortSignal.timeout(config.redemption.requestTimeoutMs) };
    const result = isPriorityConsume(request)
      ? await this.currencyService.consumeWithPriority(request, options)
      : await this.currencyService.consume(request, options);

    res.status(200).json({
      success: true,
      data: result,
    });
  }

  /**
   * Service-to-service grant
   * POST /currency/grant
   */
  async grant(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await this.respondGrant(String(req.body.userId), req.body, res);
    } catch (error) {
      next(error);
    }
  }

  private async respondGrant(userId: string, body: Record<string, unknown>, res: Response): Promise<void> {
    const result = await this.currencyService.grant(
      {
        userId,
        currencyKind: String(body.currencyKind),
        amount: Number(body.amount),
        reason: optionalString(body.reason),
        requester: optionalString(body.requester),
        metadata: optionalRecord(body.metadata),
      },
      { signal: AbortSignal.timeout(config.redemption.requestTimeoutMs) }
    );

    res.status(200).json({
      success: true,
      data: result,
    });
  }
}
