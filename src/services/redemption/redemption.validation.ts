import { ValidationChain, body, param, query } from 'express-validator';

import { CurrencyKind } from '../currency/currency.types';
import { CodeStatus, CodeType } from './redemption.code';

const codeField = (field: ValidationChain): ValidationChain =>
  field
    .exists({ values: 'falsy' })
    .withMessage('Code is required')
    .bail()
    .isString()
    .withMessage('Code must be a string')
    .bail()
    .trim()
    .isLength({ min: 1, max: 255 })
    .withMessage('Code must be between 1 and 255 characters');

export const redeemValidation = [codeField(body('code'))];

export const createCodeValidation = [
  codeField(body('code')),
  body('codeType')
    .isIn(Object.values(CodeType))
    .withMessage(`Code type must be one of: ${Object.values(CodeType).join(', ')}`),
  body('currencyKind')
    .isIn(Object.values(CurrencyKind))
    .withMessage(`Currency kind must be one of: ${Object.values(CurrencyKind).join(', ')}`),
  body('amount')
    .exists({ values: 'null' })
    .withMessage('Amount is required')
    .bail()
    .isInt()
    .withMessage('Amount must be an integer')
    .toInt(),
  body('maxUses')
    .optional()
    .isInt({ min: 0 })
    .withMessage('Max uses must be a non-negative integer')
    .toInt(),
  body('validFrom')
    .isISO8601()
    .withMessage('validFrom must be an ISO 8601 date')
    .toDate(),
  body('validUntil')
    .isISO8601()
    .withMessage('validUntil must be an ISO 8601 date')
    .toDate(),
  body('metadata')
    .optional()
    .isObject()
    .withMessage('Metadata must be an object'),
];

export const codeParamValidation = [
  param('code')
    .trim()
    .isLength({ min: 1, max: 255 })
    .withMessage('Code must be between 1 and 255 characters'),
];

export const listCodesValidation = [
  query('limit').optional().isInt().withMessage('Limit must be an integer').toInt(),
  query('offset').optional().isInt().withMessage('Offset must be an integer').toInt(),
  query('status')
    .optional()
    .isIn(Object.values(CodeStatus))
    .withMessage(`Status must be one of: ${Object.values(CodeStatus).join(', ')}`),
  query('codeType')
    .optional()
    .isIn(Object.values(CodeType))
    .withMessage(`Code type must be one of: ${Object.values(CodeType).join(', ')}`),
];
