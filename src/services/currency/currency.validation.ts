import { body, param, query } from 'express-validator';

import { LedgerEntryKind } from '../ledger/ledger.types';
import { AUTO_CURRENCY_KIND, CurrencyKind, IDENTIFIER_PATTERN } from './currency.types';

const currencyKinds = Object.values(CurrencyKind);
const consumableKinds = [...currencyKinds, AUTO_CURRENCY_KIND];
const ledgerEntryKinds = Object.values(LedgerEntryKind);

const currencyKindField = (allowed: string[]) =>
  body('currencyKind')
    .isIn(allowed)
    .withMessage(`Currency kind must be one of: ${allowed.join(', ')}`);

const amountField = () =>
  body('amount')
    .exists({ values: 'null' })
    .withMessage('Amount is required')
    .bail()
    .isInt()
    .withMessage('Amount must be an integer')
    .toInt();

const metadataField = () =>
  body('metadata').optional().isObject().withMessage('Metadata must be an object');

export const userParamValidation = [
  param('userId')
    .matches(IDENTIFIER_PATTERN)
    .withMessage('User ID must be 1-255 letters, digits or _-.@'),
];

export const consumeValidation = [
  currencyKindField(consumableKinds),
  amountField(),
  body('usePriority').optional().isBoolean({ strict: true }).withMessage('usePriority must be a boolean'),
  body('itemId')
    .optional()
    .isString()
    .withMessage('Item ID must be a string')
    .isLength({ max: 255 })
    .withMessage('Item ID must be at most 255 characters'),
  metadataField(),
];

const grantFields = [
  currencyKindField(currencyKinds),
  amountField(),
  body('reason')
    .optional()
    .isString()
    .withMessage('Reason must be a string')
    .isLength({ max: 255 })
    .withMessage('Reason must be at most 255 characters'),
  body('requester')
    .optional()
    .isString()
    .withMessage('Requester must be a string'),
  metadataField(),
];

export const grantValidation = [
  body('userId')
    .isString()
    .withMessage('User ID is required')
    .bail()
    .matches(IDENTIFIER_PATTERN)
    .withMessage('User ID must be 1-255 letters, digits or _-.@'),
  ...grantFields,
];

/** Grant on the path's user; the body carries no userId */
export const userGrantValidation = [...userParamValidation, ...grantFields];

export const userConsumeValidation = [
  ...userParamValidation,
  ...consumeValidation,
  body('requester').optional().isString().withMessage('Requester must be a string'),
];

export const historyQueryValidation = [
  query('limit').optional().isInt().withMessage('Limit must be an integer').toInt(),
  query('offset').optional().isInt().withMessage('Offset must be an integer').toInt(),
  query('currencyKind')
    .optional()
    .isIn(currencyKinds)
    .withMessage(`Currency kind must be one of: ${currencyKinds.join(', ')}`),
  query('kind')
    .optional()
    .isIn(ledgerEntryKinds)
    .withMessage(`Entry kind must be one of: ${ledgerEntryKinds.join(', ')}`),
];

export const userHistoryValidation = [...userParamValidation, ...historyQueryValidation];

export const ledgerEntryParamValidation = [
  param('entryId')
    .matches(IDENTIFIER_PATTERN)
    .withMessage('Ledger entry ID is invalid'),
];
