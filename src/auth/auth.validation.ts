import { param } from 'express-validator';

import { IDENTIFIER_PATTERN } from '../services/currency/currency.types';

export const issueTokenValidation = [
  param('userId')
    .matches(IDENTIFIER_PATTERN)
    .withMessage('User ID must be 1-255 letters, digits or _-.@'),
];
