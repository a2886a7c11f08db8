import { BadRequestException } from '@nestjs/common';
import { registerDecorator, ValidationOptions } from 'class-validator';
import { isAddress, toChecksumAddress } from 'web3-utils';
import { ExchangeErrorCode, ExchangeException } from './errors/exchange.errors';

export function IsAddress(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isAddress',
      target: object.constructor,
      propertyName: propertyName,
      options: {
        ...validationOptions,
        message: `${propertyName} must be a valid token address`,
      },
      validator: {
        validate(value: unknown) {
          return typeof value === 'string' && isAddress(value);
        },
      },
    });
  };
}

export function formatEthereumAddress(value: { value: unknown; key: string }): string {
  if (typeof value.value !== 'string' || !isAddress(value.value)) {
    throw new BadRequestException({
      message: [`${value.key} must be a valid address, the value ${String(value.value)} is invalid`],
      error: 'Bad Request',
      statusCode: 400,
    });
  }
  return toChecksumAddress(value.value);
}

const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

// engine-side counterpart of formatEthereumAddress; the zero address is never a token
export function checksumAddress(value: string): string {
  if (!isAddress(value) || sameAddress(value, ZERO_ADDRESS)) {
    throw new ExchangeException(ExchangeErrorCode.InvalidAddress, `${value} is not an address`);
  }
  return toChecksumAddress(value);
}

export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
