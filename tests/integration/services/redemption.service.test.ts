/**
 * Redemption Service Integration Tests
 *
 * Runs the full redemption flow against the in-memory store: code validation,
 * the per-user fence, the balance grant with version checks and rollback.
 */

import { RedemptionService } from '../../../src/services/redemption/redemption.service';
import { CodeStatus, CodeType } from '../../../src/services/redemption/redemption.code';
import { CurrencyKind } from '../../../src/services/currency/currency.types';
import { LedgerEntryKind, LedgerEntryStatus } from '../../../src/services/ledger/ledger.types';
import { DuplicateKeyError, OptimisticLockError } from '../../../src/repositories/errors';
import { ApiError } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';
import { redemptionsTotal } from '../../../src/observability/metrics';
import { logContextFields, runWithContext } from '../../../src/observability/log-context';
import {
  InMemoryStore,
  MemoryAccountRepository,
  MemoryCodeRepository,
  MemoryLedgerRepository,
} from '../../helpers/inMemoryStore';
import {
  FIXED_NOW,
  daysFrom,
  fixedClock,
  seedAccount,
  seedCode,
  settle,
} from '../../helpers/fixtures';

describe('RedemptionService', () => {
  let store: InMemoryStore;
  let service: RedemptionService;

  beforeEach(() => {
    store = new InMemoryStore();
    service = new RedemptionService({
      repositories: store.repositories,
      scope: store.scope,
      clock: fixedClock,
      retryPolicy: { maxAttempts: 3, baseBackoffMs: 0 },
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('redeem', () => {
    it('should tag the request log context with the ids it mints', async () => {
      seedCode(store, { code: 'TESTCODE123' });

      const { result, fields } = await runWithContext({ correlationId: 'req-1' }, async () => ({
        result: await service.redeem({ code: 'TESTCODE123', userId: 'user-1' }),
        fields: logContextFields(),
      }));

      expect(fields).toEqual({
        correlationId: 'req-1',
        userId: 'user-1',
        code: 'TESTCODE123',
        redemptionId: result.redemptionId,
        ledgerEntryId: result.ledgerEntryId,
      });
    });

    it('should grant the code amount on top of an existing balance', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000, currencyKind: CurrencyKind.PAID });
      seedAccount(store, 'user-1', CurrencyKind.PAID, 500, 1);

      const result = await service.redeem({ code: 'TESTCODE123', userId: 'user-1' });

      expect(result).toEqual({
        redemptionId: expect.stringMatching(/^red_/),
        ledgerEntryId: expect.stringMatching(/^txn_/),
        code: 'TESTCODE123',
        currencyKind: CurrencyKind.PAID,
        amount: 1000,
        balanceAfter: 1500,
        status: 'completed',
      });
      expect(store.account('user-1', CurrencyKind.PAID)).toEqual({
        ownerId: 'user-1',
        currencyKind: CurrencyKind.PAID,
        balance: 1500,
        version: 2,
      });

      const [entry] = store.ledgerEntries('user-1');
      expect(entry).toMatchObject({
        id: result.ledgerEntryId,
        kind: LedgerEntryKind.GRANT,
        currencyKind: CurrencyKind.PAID,
        amount: 1000,
        balanceBefore: 500,
        balanceAfter: 1500,
        status: LedgerEntryStatus.COMPLETED,
        metadata: { code: 'TESTCODE123', codeType: CodeType.PROMOTION, redemptionId: result.redemptionId },
        createdAt: FIXED_NOW,
      });

      expect(store.redemptions()).toEqual([
        {
          redemptionId: result.redemptionId,
          code: 'TESTCODE123',
          userId: 'user-1',
          ledgerEntryId: result.ledgerEntryId,
          redeemedAt: FIXED_NOW,
        },
      ]);
      expect(store.code('TESTCODE123')).toMatchObject({ currentUses: 1, updatedAt: FIXED_NOW });
    });

    it('should open an account for a first-time user', async () => {
      seedCode(store, { code: 'WELCOME', amount: 50, currencyKind: CurrencyKind.FREE });

      const result = await service.redeem({ code: 'WELCOME', userId: 'new-user' });

      expect(result.balanceAfter).toBe(50);
      expect(store.account('new-user', CurrencyKind.FREE)).toMatchObject({ balance: 50, version: 1 });
      expect(store.ledgerEntries('new-user')[0]).toMatchObject({ balanceBefore: 0, balanceAfter: 50 });
    });

    it('should trim the submitted code', async () => {
      seedCode(store, { code: 'TESTCODE123' });

      const result = await service.redeem({ code: '  TESTCODE123  ', userId: 'user-1' });

      expect(result.code).toBe('TESTCODE123');
    });

    it('should fail with CODE_NOT_FOUND for an unknown code', async () => {
      await expect(service.redeem({ code: 'MISSING', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_NOT_FOUND,
      });
      expect(store.commits).toBe(0);
    });

    it('should reject an empty code before touching the store', async () => {
      const find = jest.spyOn(MemoryCodeRepository.prototype, 'findByCode');

      await expect(service.redeem({ code: ' ', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.VALIDATION_ERROR,
      });
      expect(find).not.toHaveBeenCalled();
    });

    it('should reject an invalid user id', async () => {
      await expect(service.redeem({ code: 'TESTCODE123', userId: 'bad user' })).rejects.toMatchObject({
        errorCode: ErrorCode.VALIDATION_ERROR,
      });
    });

    it('should reject an exhausted code without writing anything', async () => {
      seedCode(store, { code: 'TESTCODE123', maxUses: 1, currentUses: 1 });
      const before = store.code('TESTCODE123');

      await expect(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_NOT_REDEEMABLE,
      });

      expect(store.commits).toBe(0);
      expect(store.rollbacks).toBe(0);
      expect(store.code('TESTCODE123')).toEqual(before);
      expect(store.account('user-1', CurrencyKind.PAID)).toBeUndefined();
      expect(store.ledgerEntries()).toEqual([]);
      expect(store.redemptions()).toEqual([]);
    });

    it('should reject an expired window before any persistence call', async () => {
      seedCode(store, {
        code: 'OLDCODE',
        validFrom: daysFrom(FIXED_NOW, -30),
        validUntil: daysFrom(FIXED_NOW, -1),
      });
      const hasRedeemed = jest.spyOn(MemoryCodeRepository.prototype, 'hasUserRedeemed');
      const update = jest.spyOn(MemoryCodeRepository.prototype, 'update');
      const run = jest.spyOn(store.scope, 'run');

      await expect(service.redeem({ code: 'OLDCODE', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_NOT_REDEEMABLE,
      });

      expect(hasRedeemed).not.toHaveBeenCalled();
      expect(update).not.toHaveBeenCalled();
      expect(run).not.toHaveBeenCalled();
    });

    it('should reject a code that is not yet valid', async () => {
      seedCode(store, { code: 'SOON', validFrom: daysFrom(FIXED_NOW, 1), validUntil: daysFrom(FIXED_NOW, 2) });

      await expect(service.redeem({ code: 'SOON', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_NOT_REDEEMABLE,
      });
    });

    it.each([CodeStatus.DISABLED, CodeStatus.EXPIRED])('should reject a %s code', async (status) => {
      seedCode(store, { code: 'TESTCODE123', status });

      await expect(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_NOT_REDEEMABLE,
      });
    });

    it('should refuse a second redemption by the same user', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000 });
      await service.redeem({ code: 'TESTCODE123', userId: 'user-1' });

      await expect(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.USER_ALREADY_REDEEMED,
      });

      expect(store.code('TESTCODE123')?.currentUses).toBe(1);
      expect(store.account('user-1', CurrencyKind.PAID)).toMatchObject({ balance: 1000, version: 1 });
      expect(store.ledgerEntries('user-1')).toHaveLength(1);
    });

    it('should let different users redeem an unlimited code', async () => {
      seedCode(store, { code: 'TESTCODE123', maxUses: 0 });

      await service.redeem({ code: 'TESTCODE123', userId: 'user-1' });
      await service.redeem({ code: 'TESTCODE123', userId: 'user-2' });
      await service.redeem({ code: 'TESTCODE123', userId: 'user-3' });

      expect(store.code('TESTCODE123')?.currentUses).toBe(3);
      expect(store.redemptions()).toHaveLength(3);
    });

    it('should enforce the use cap across users', async () => {
      seedCode(store, { code: 'ONCE', maxUses: 1 });
      await service.redeem({ code: 'ONCE', userId: 'user-1' });

      await expect(service.redeem({ code: 'ONCE', userId: 'user-2' })).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_NOT_REDEEMABLE,
      });

      expect(store.code('ONCE')?.currentUses).toBe(1);
      expect(store.account('user-2', CurrencyKind.PAID)).toBeUndefined();
    });

    it('should let exactly one of many concurrent requests by one user succeed', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000, maxUses: 0 });

      const outcomes = await Promise.all(
        Array.from({ length: 5 }, () => settle(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })))
      );

      const successes = outcomes.filter((outcome) => outcome.ok);
      const failures = outcomes.flatMap((outcome) => (outcome.ok ? [] : [outcome.error]));
      expect(successes).toHaveLength(1);
      expect(failures).toHaveLength(4);
      for (const error of failures) {
        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({ errorCode: ErrorCode.USER_ALREADY_REDEEMED });
      }

      expect(store.code('TESTCODE123')?.currentUses).toBe(1);
      expect(store.account('user-1', CurrencyKind.PAID)).toMatchObject({ balance: 1000, version: 1 });
      expect(store.ledgerEntries('user-1')).toHaveLength(1);
      expect(store.redemptions()).toHaveLength(1);
    });

    it('should never exceed the cap under concurrent requests by different users', async () => {
      seedCode(store, { code: 'TWICE', maxUses: 2 });

      const outcomes = await Promise.all(
        ['user-1', 'user-2', 'user-3', 'user-4'].map((userId) =>
          settle(service.redeem({ code: 'TWICE', userId }))
        )
      );

      expect(outcomes.filter((outcome) => outcome.ok)).toHaveLength(2);
      for (const outcome of outcomes) {
        if (!outcome.ok) {
          expect(outcome.error).toMatchObject({ errorCode: ErrorCode.CODE_NOT_REDEEMABLE });
        }
      }
      expect(store.code('TWICE')?.currentUses).toBe(2);
      expect(store.redemptions()).toHaveLength(2);
    });

    it('should translate a lost race on the redemption record into USER_ALREADY_REDEEMED and roll back', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000 });
      seedAccount(store, 'user-1', CurrencyKind.PAID, 500, 1);
      // the pre-check misses a record that the unique index then catches
      jest.spyOn(MemoryCodeRepository.prototype, 'hasUserRedeemed').mockResolvedValue(false);
      jest
        .spyOn(MemoryCodeRepository.prototype, 'saveRedemption')
        .mockRejectedValue(new DuplicateKeyError('code_redemptions'));

      await expect(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.USER_ALREADY_REDEEMED,
      });

      expect(store.rollbacks).toBe(1);
      expect(store.account('user-1', CurrencyKind.PAID)).toMatchObject({ balance: 500, version: 1 });
      expect(store.code('TESTCODE123')?.currentUses).toBe(0);
      expect(store.ledgerEntries()).toEqual([]);
    });

    it('should apply the grant once after a single version conflict', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000 });
      seedAccount(store, 'user-1', CurrencyKind.PAID, 500, 1);
      const originalSave = MemoryAccountRepository.prototype.save;
      const save = jest
        .spyOn(MemoryAccountRepository.prototype, 'save')
        .mockRejectedValueOnce(new OptimisticLockError('user-1', 1))
        .mockImplementation(async function (this: MemoryAccountRepository, account) {
          return originalSave.call(this, account);
        });

      const result = await service.redeem({ code: 'TESTCODE123', userId: 'user-1' });

      expect(save).toHaveBeenCalledTimes(2);
      expect(result.balanceAfter).toBe(1500);
      expect(store.account('user-1', CurrencyKind.PAID)).toMatchObject({ balance: 1500, version: 2 });
      expect(store.ledgerEntries('user-1')).toHaveLength(1);
      expect(store.ledgerEntries('user-1')[0]).toMatchObject({ balanceBefore: 500, balanceAfter: 1500 });
    });

    it('should grant on top of a balance change that landed between the read and the save', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000 });
      seedAccount(store, 'user-1', CurrencyKind.PAID, 500, 1);
      store.concurrentAccountWrite('user-1', CurrencyKind.PAID, -200);

      const result = await service.redeem({ code: 'TESTCODE123', userId: 'user-1' });

      expect(result.balanceAfter).toBe(1300);
      expect(store.account('user-1', CurrencyKind.PAID)).toMatchObject({ balance: 1300, version: 3 });
      expect(store.ledgerEntries('user-1')).toEqual([
        expect.objectContaining({ amount: 1000, balanceBefore: 300, balanceAfter: 1300 }),
      ]);
      expect(store.code('TESTCODE123')?.currentUses).toBe(1);
      expect(store.redemptions()).toHaveLength(1);
    });

    it('should fail with a wrapped error after three consecutive conflicts and persist nothing', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000 });
      seedAccount(store, 'user-1', CurrencyKind.PAID, 500, 1);
      const save = jest
        .spyOn(MemoryAccountRepository.prototype, 'save')
        .mockRejectedValue(new OptimisticLockError('user-1', 1));

      const outcome = await settle(service.redeem({ code: 'TESTCODE123', userId: 'user-1' }));

      expect(outcome.ok).toBe(false);
      expect(outcome.ok ? undefined : outcome.error).toMatchObject({
        errorCode: ErrorCode.DATABASE_ERROR,
        message: 'failed to save currency account after 3 attempts: account user-1 was modified concurrently (expected version 1)',
      });
      expect(save).toHaveBeenCalledTimes(3);
      expect(store.ledgerEntries()).toEqual([]);
      expect(store.redemptions()).toEqual([]);
      expect(store.code('TESTCODE123')?.currentUses).toBe(0);
      expect(store.account('user-1', CurrencyKind.PAID)).toMatchObject({ balance: 500, version: 1 });
    });

    it('should leave the account untouched when the ledger append fails', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000 });
      seedAccount(store, 'user-1', CurrencyKind.PAID, 500, 1);
      jest.spyOn(MemoryLedgerRepository.prototype, 'append').mockRejectedValue(new Error('disk full'));

      await expect(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.DATABASE_ERROR,
        message: 'failed to append ledger entry: disk full',
      });

      expect(store.account('user-1', CurrencyKind.PAID)).toMatchObject({ balance: 500, version: 1 });
      expect(store.code('TESTCODE123')?.currentUses).toBe(0);
      expect(store.redemptions()).toEqual([]);
    });

    it('should leave the account untouched when saving the redemption fails', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000 });
      seedAccount(store, 'user-1', CurrencyKind.PAID, 500, 1);
      jest
        .spyOn(MemoryCodeRepository.prototype, 'saveRedemption')
        .mockRejectedValue(new Error('write timeout'));

      await expect(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.DATABASE_ERROR,
        message: 'failed to save redemption: write timeout',
      });

      expect(store.account('user-1', CurrencyKind.PAID)).toMatchObject({ balance: 500, version: 1 });
      expect(store.ledgerEntries()).toEqual([]);
      expect(store.code('TESTCODE123')?.currentUses).toBe(0);
    });

    it('should roll back when the work fails with an unexpected fault', async () => {
      seedCode(store, { code: 'TESTCODE123', amount: 1000 });
      jest.spyOn(MemoryLedgerRepository.prototype, 'append').mockImplementation(() => {
        throw new TypeError('cannot read properties of undefined');
      });

      await expect(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.DATABASE_ERROR,
      });

      expect(store.rollbacks).toBe(1);
      expect(store.account('user-1', CurrencyKind.PAID)).toBeUndefined();
    });

    it('should wrap a failing code lookup with context', async () => {
      jest.spyOn(MemoryCodeRepository.prototype, 'findByCode').mockRejectedValue(new Error('no primary'));

      await expect(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.DATABASE_ERROR,
        message: 'failed to find code: no primary',
      });
    });

    it('should report a scope that cannot start as a persistence failure', async () => {
      seedCode(store, { code: 'TESTCODE123' });
      jest
        .spyOn(store.scope, 'run')
        .mockRejectedValue(ApiError.database('failed to begin atomic scope', new Error('pool exhausted')));

      await expect(service.redeem({ code: 'TESTCODE123', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.DATABASE_ERROR,
        message: 'failed to begin atomic scope: pool exhausted',
      });
    });

    it('should abort promptly when the caller gives up', async () => {
      seedCode(store, { code: 'TESTCODE123' });
      const controller = new AbortController();
      controller.abort();

      await expect(
        service.redeem({ code: 'TESTCODE123', userId: 'user-1' }, { signal: controller.signal })
      ).rejects.toMatchObject({ errorCode: ErrorCode.OPERATION_ABORTED });
      expect(store.commits).toBe(0);
    });

    it('should reject when the code was exhausted between the checks and the scope', async () => {
      seedCode(store, { code: 'ONCE', maxUses: 1 });
      const originalFind = MemoryCodeRepository.prototype.findByCode;
      let lookups = 0;
      jest
        .spyOn(MemoryCodeRepository.prototype, 'findByCode')
        .mockImplementation(async function (this: MemoryCodeRepository, code) {
          const found = await originalFind.call(this, code);
          lookups += 1;
          if (lookups === 1) {
            // someone else takes the last use right after the pre-check read
            seedCode(store, { code: 'ONCE', maxUses: 1, currentUses: 1 });
          }
          return found;
        });

      await expect(service.redeem({ code: 'ONCE', userId: 'user-1' })).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_NOT_REDEEMABLE,
      });
      expect(store.rollbacks).toBe(1);
      expect(store.account('user-1', CurrencyKind.PAID)).toBeUndefined();
    });

    it('should count outcomes in metrics', async () => {
      seedCode(store, { code: 'TESTCODE123' });
      await service.redeem({ code: 'TESTCODE123', userId: 'user-1' });
      await settle(service.redeem({ code: 'TESTCODE123', userId: 'user-1' }));

      const { values } = await redemptionsTotal.get();
      const byOutcome = Object.fromEntries(values.map((value) => [value.labels.outcome, value.value]));
      expect(byOutcome).toEqual({ completed: 1, user_already_redeemed: 1 });
    });
  });

  describe('createCode', () => {
    const request = {
      code: 'NEWYEAR',
      codeType: 'event',
      currencyKind: 'free',
      amount: 300,
      maxUses: 100,
      validFrom: daysFrom(FIXED_NOW, 0),
      validUntil: daysFrom(FIXED_NOW, 7),
      metadata: { campaign: 'new-year' },
    };

    it('should store an active code', async () => {
      const created = await service.createCode(request);

      expect(created).toEqual({
        code: 'NEWYEAR',
        codeType: CodeType.EVENT,
        currencyKind: CurrencyKind.FREE,
        amount: 300,
        maxUses: 100,
        currentUses: 0,
        validFrom: request.validFrom,
        validUntil: request.validUntil,
        status: CodeStatus.ACTIVE,
        metadata: { campaign: 'new-year' },
        createdAt: FIXED_NOW,
        updatedAt: FIXED_NOW,
      });
      expect(store.code('NEWYEAR')).toEqual(created);
    });

    it('should default max uses to unlimited', async () => {
      const created = await service.createCode({ ...request, maxUses: undefined });

      expect(created.maxUses).toBe(0);
    });

    it('should reject validUntil before validFrom before any persistence call', async () => {
      const create = jest.spyOn(MemoryCodeRepository.prototype, 'create');

      await expect(
        service.createCode({ ...request, validFrom: daysFrom(FIXED_NOW, 7), validUntil: daysFrom(FIXED_NOW, 0) })
      ).rejects.toMatchObject({ errorCode: ErrorCode.VALIDATION_ERROR });

      expect(create).not.toHaveBeenCalled();
      expect(store.code('NEWYEAR')).toBeUndefined();
    });

    it('should reject a duplicate code', async () => {
      await service.createCode(request);

      await expect(service.createCode(request)).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_ALREADY_EXISTS,
      });
    });

    it('should reject an invalid amount', async () => {
      await expect(service.createCode({ ...request, amount: 0 })).rejects.toMatchObject({
        errorCode: ErrorCode.INVALID_AMOUNT,
      });
    });
  });

  describe('deleteCode', () => {
    it('should delete an unredeemed code', async () => {
      seedCode(store, { code: 'UNUSED' });

      await service.deleteCode('UNUSED');

      expect(store.code('UNUSED')).toBeUndefined();
    });

    it('should refuse to delete a redeemed code', async () => {
      seedCode(store, { code: 'TESTCODE123' });
      await service.redeem({ code: 'TESTCODE123', userId: 'user-1' });

      await expect(service.deleteCode('TESTCODE123')).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_CANNOT_BE_DELETED,
      });
      expect(store.code('TESTCODE123')).toBeDefined();
    });

    it('should fail with CODE_NOT_FOUND for an unknown code', async () => {
      await expect(service.deleteCode('MISSING')).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_NOT_FOUND,
      });
    });
  });

  describe('getCode', () => {
    it('should return the stored code', async () => {
      const seeded = seedCode(store, { code: 'TESTCODE123', amount: 42 });

      expect(await service.getCode('TESTCODE123')).toEqual(seeded);
    });

    it('should fail with CODE_NOT_FOUND for an unknown code', async () => {
      await expect(service.getCode('MISSING')).rejects.toMatchObject({
        errorCode: ErrorCode.CODE_NOT_FOUND,
      });
    });
  });

  describe('listCodes', () => {
    beforeEach(() => {
      seedCode(store, { code: 'A', createdAt: daysFrom(FIXED_NOW, -3), codeType: CodeType.GIFT });
      seedCode(store, { code: 'B', createdAt: daysFrom(FIXED_NOW, -2), status: CodeStatus.DISABLED });
      seedCode(store, { code: 'C', createdAt: daysFrom(FIXED_NOW, -1), codeType: CodeType.GIFT });
    });

    it('should list newest first with the default page', async () => {
      const page = await service.listCodes();

      expect(page.codes.map((code) => code.code)).toEqual(['C', 'B', 'A']);
      expect(page).toMatchObject({ total: 3, limit: 50, offset: 0 });
    });

    it('should clamp limit and offset', async () => {
      expect(await service.listCodes({ limit: 0, offset: -5 })).toMatchObject({ limit: 50, offset: 0 });
      expect(await service.listCodes({ limit: 1000 })).toMatchObject({ limit: 100 });
    });

    it('should page through codes', async () => {
      const page = await service.listCodes({ limit: 1, offset: 1 });

      expect(page.codes.map((code) => code.code)).toEqual(['B']);
      expect(page.total).toBe(3);
    });

    it('should filter the fetched page by status and type', async () => {
      const active = await service.listCodes({ status: 'active' });
      const gifts = await service.listCodes({ codeType: 'gift' });
      const disabledGifts = await service.listCodes({ status: 'disabled', codeType: 'gift' });

      expect(active.codes.map((code) => code.code)).toEqual(['C', 'A']);
      expect(gifts.codes.map((code) => code.code)).toEqual(['C', 'A']);
      expect(disabledGifts.codes).toEqual([]);
      expect(active.total).toBe(3);
    });

    it('should reject an unknown status filter', async () => {
      await expect(service.listCodes({ status: 'archived' })).rejects.toMatchObject({
        errorCode: ErrorCode.VALIDATION_ERROR,
      });
    });
  });
});
