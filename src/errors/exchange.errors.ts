import { HttpException, HttpStatus } from '@nestjs/common';

export enum ExchangeErrorCode {
  // input validation
  InvalidAddress = 'InvalidAddress',
  IdenticalAddresses = 'IdenticalAddresses',
  InvalidOrderValue = 'InvalidOrderValue',
  InvalidRate = 'InvalidRate',
  InvalidTradeActionStrategyId = 'InvalidTradeActionStrategyId',
  InvalidTradeActionAmount = 'InvalidTradeActionAmount',
  InvalidConstraint = 'InvalidConstraint',
  DeadlineExpired = 'DeadlineExpired',
  InvalidIndices = 'InvalidIndices',
  InvalidFee = 'InvalidFee',
  InvalidPrice = 'InvalidPrice',
  InvalidCurve = 'InvalidCurve',
  InvalidTrade = 'InvalidTrade',
  InvalidTokenLength = 'InvalidTokenLength',
  DuplicateToken = 'DuplicateToken',

  // state consistency
  StrategyDoesNotExist = 'StrategyDoesNotExist',
  PairDoesNotExist = 'PairDoesNotExist',
  PairAlreadyExists = 'PairAlreadyExists',
  Outdated = 'Outdated',
  AccessDenied = 'AccessDenied',
  TradingDisabled = 'TradingDisabled',
  TradingNotStarted = 'TradingNotStarted',
  OrderExpired = 'OrderExpired',
  ReentrantCall = 'ReentrantCall',

  // economic constraints
  InsufficientLiquidity = 'InsufficientLiquidity',
  InsufficientCapacity = 'InsufficientCapacity',
  InsufficientSaleAmount = 'InsufficientSaleAmount',
  InsufficientNativeTokenSent = 'InsufficientNativeTokenSent',
  GreaterThanMaxInput = 'GreaterThanMaxInput',
  LowerThanMinReturn = 'LowerThanMinReturn',
  OrderDisabled = 'OrderDisabled',
  InsufficientBalance = 'InsufficientBalance',

  // arithmetic domain
  Overflow = 'Overflow',
  Underflow = 'Underflow',
  DivisionByZero = 'DivisionByZero',
}

export type ExchangeErrorKind = 'validation' | 'state' | 'economic' | 'arithmetic';

const STATE_ERRORS = new Set<ExchangeErrorCode>([
  ExchangeErrorCode.StrategyDoesNotExist,
  ExchangeErrorCode.PairDoesNotExist,
  ExchangeErrorCode.PairAlreadyExists,
  ExchangeErrorCode.Outdated,
  ExchangeErrorCode.AccessDenied,
  ExchangeErrorCode.TradingDisabled,
  ExchangeErrorCode.TradingNotStarted,
  ExchangeErrorCode.OrderExpired,
  ExchangeErrorCode.ReentrantCall,
]);

const ECONOMIC_ERRORS = new Set<ExchangeErrorCode>([
  ExchangeErrorCode.InsufficientLiquidity,
  ExchangeErrorCode.InsufficientCapacity,
  ExchangeErrorCode.InsufficientSaleAmount,
  ExchangeErrorCode.InsufficientNativeTokenSent,
  ExchangeErrorCode.GreaterThanMaxInput,
  ExchangeErrorCode.LowerThanMinReturn,
  ExchangeErrorCode.OrderDisabled,
  ExchangeErrorCode.InsufficientBalance,
]);

const ARITHMETIC_ERRORS = new Set<ExchangeErrorCode>([
  ExchangeErrorCode.Overflow,
  ExchangeErrorCode.Underflow,
  ExchangeErrorCode.DivisionByZero,
]);

export function errorKind(code: ExchangeErrorCode): ExchangeErrorKind {
  if (ARITHMETIC_ERRORS.has(code)) {
    return 'arithmetic';
  }
  if (ECONOMIC_ERRORS.has(code)) {
    return 'economic';
  }
  if (STATE_ERRORS.has(code)) {
    return 'state';
  }
  return 'validation';
}

function statusFor(code: ExchangeErrorCode): HttpStatus {
  switch (code) {
    case ExchangeErrorCode.StrategyDoesNotExist:
    case ExchangeErrorCode.PairDoesNotExist:
      return HttpStatus.NOT_FOUND;
    case ExchangeErrorCode.AccessDenied:
      return HttpStatus.FORBIDDEN;
  }

  switch (errorKind(code)) {
    case 'arithmetic':
      return HttpStatus.INTERNAL_SERVER_ERROR;
    case 'state':
      return HttpStatus.CONFLICT;
    default:
      return HttpStatus.BAD_REQUEST;
  }
}

/**
 * Every rejection raised by the engine. The message is always the bare error code so
 * callers can switch on it; `details` carries optional context for logs.
 */
export class ExchangeException extends HttpException {
  readonly code: ExchangeErrorCode;
  readonly kind: ExchangeErrorKind;

  constructor(code: ExchangeErrorCode, details?: string) {
    const statusCode = statusFor(code);
    super({ statusCode, error: code, message: code, ...(details ? { details } : {}) }, statusCode);
    this.code = code;
    this.kind = errorKind(code);
  }
}

export function isExchangeError(error: unknown, code?: ExchangeErrorCode): error is ExchangeException {
  return error instanceof ExchangeException && (code === undefined || error.code === code);
}
