import { HttpStatus } from '@nestjs/common';
import { errorKind, ExchangeErrorCode, ExchangeException, isExchangeError } from './exchange.errors';

describe('ExchangeException', () => {
  it('should use the code as the message', () => {
    const error = new ExchangeException(ExchangeErrorCode.InsufficientLiquidity);
    expect(error.message).toBe('InsufficientLiquidity');
    expect(error.code).toBe(ExchangeErrorCode.InsufficientLiquidity);
    expect(error.kind).toBe('economic');
  });

  it('should map codes to http statuses', () => {
    expect(new ExchangeException(ExchangeErrorCode.StrategyDoesNotExist).getStatus()).toBe(HttpStatus.NOT_FOUND);
    expect(new ExchangeException(ExchangeErrorCode.AccessDenied).getStatus()).toBe(HttpStatus.FORBIDDEN);
    expect(new ExchangeException(ExchangeErrorCode.Outdated).getStatus()).toBe(HttpStatus.CONFLICT);
    expect(new ExchangeException(ExchangeErrorCode.Overflow).getStatus()).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
    expect(new ExchangeException(ExchangeErrorCode.InvalidRate).getStatus()).toBe(HttpStatus.BAD_REQUEST);
  });

  it('should carry details in the response body', () => {
    const error = new ExchangeException(ExchangeErrorCode.InvalidCurve, 'halflife must be positive');
    expect(error.getResponse()).toEqual({
      statusCode: HttpStatus.BAD_REQUEST,
      error: 'InvalidCurve',
      message: 'InvalidCurve',
      details: 'halflife must be positive',
    });
  });

  it('should classify every code', () => {
    expect(errorKind(ExchangeErrorCode.DivisionByZero)).toBe('arithmetic');
    expect(errorKind(ExchangeErrorCode.ReentrantCall)).toBe('state');
    expect(errorKind(ExchangeErrorCode.DeadlineExpired)).toBe('validation');
  });

  it('should narrow by code', () => {
    const error: unknown = new ExchangeException(ExchangeErrorCode.Outdated);
    expect(isExchangeError(error)).toBe(true);
    expect(isExchangeError(error, ExchangeErrorCode.Outdated)).toBe(true);
    expect(isExchangeError(error, ExchangeErrorCode.AccessDenied)).toBe(false);
    expect(isExchangeError(new Error('Outdated'))).toBe(false);
  });
});
