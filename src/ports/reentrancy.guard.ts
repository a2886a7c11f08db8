import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';

export class ReentrancyGuard {
  private entered = false;

  run<T>(operation: () => T): T {
    if (this.entered) {
      throw new ExchangeException(ExchangeErrorCode.ReentrantCall);
    }
    this.entered = true;
    try {
      return operation();
    } finally {
      this.entered = false;
    }
  }
}
