import { BadRequestException } from '@nestjs/common';
import { registerDecorator, ValidationOptions } from 'class-validator';
import { BigNumber } from '@ethersproject/bignumber';

const UINT_PATTERN = /^\d+$/;

// amounts and ids travel as decimal strings since they overflow JSON numbers
export function IsUintString(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isUintString',
      target: object.constructor,
      propertyName: propertyName,
      options: {
        ...validationOptions,
        message: `${propertyName} must be a non-negative integer string`,
      },
      validator: {
        validate(value: unknown) {
          return typeof value === 'string' && UINT_PATTERN.test(value);
        },
      },
    });
  };
}

export function parseUint(value: { value: string; key: string }): bigint {
  if (!UINT_PATTERN.test(value.value)) {
    throw new BadRequestException({
      message: [`${value.key} must be a non-negative integer, the value ${value.value} is invalid`],
      error: 'Bad Request',
      statusCode: 400,
    });
  }
  return BigNumber.from(value.value).toBigInt();
}
