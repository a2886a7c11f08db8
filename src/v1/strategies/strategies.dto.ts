import {
  IsOptional,
  IsNumber,
  Min,
  IsArray,
  ValidateNested,
  IsBoolean,
  IsInt,
  ArrayNotEmpty,
  ArrayMinSize,
  ArrayMaxSize,
  IsIn,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsAddress } from '../../isAddress.validator';
import { IsUintString } from '../../isUintString.validator';

export class StrategiesByPairQueryDto {
  @ApiProperty({ description: 'First token of the pair' })
  @IsAddress()
  token0!: string;

  @ApiProperty({ description: 'Second token of the pair' })
  @IsAddress()
  token1!: string;

  @ApiProperty({
    description: 'Index of the first strategy to return',
    required: false,
    default: 0,
  })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  start?: number = 0;

  @ApiProperty({
    description: 'Index after the last strategy to return (0 = up to the last one)',
    required: false,
    default: 0,
  })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  end?: number = 0;
}

export class TradeActionDto {
  @ApiProperty({ description: 'Strategy id as a decimal string' })
  @IsUintString()
  strategyId!: string;

  @ApiProperty({ description: 'Source or target amount, depending on byTargetAmount' })
  @IsUintString()
  amount!: string;
}

export class QuoteDto {
  @ApiProperty()
  @IsAddress()
  sourceToken!: string;

  @ApiProperty()
  @IsAddress()
  targetToken!: string;

  @ApiProperty({ type: [TradeActionDto] })
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => TradeActionDto)
  tradeActions!: TradeActionDto[];

  @ApiProperty()
  @IsBoolean()
  byTargetAmount!: boolean;
}

export class TradeDto extends QuoteDto {
  @ApiProperty({ description: 'Trader address' })
  @IsAddress()
  caller!: string;

  @ApiProperty({ description: 'Unix timestamp after which the trade is rejected' })
  @Type(() => Number)
  @IsInt()
  deadline!: number;

  @ApiProperty({ description: 'Maximum input when trading by target amount, minimum return otherwise' })
  @IsUintString()
  constraint!: string;
}

export class OrderDto {
  @ApiProperty({ description: 'Liquidity' })
  @IsUintString()
  y!: string;

  @ApiProperty({ description: 'Capacity, at least the liquidity' })
  @IsUintString()
  z!: string;

  @ApiProperty({ description: 'Compressed rate range' })
  @IsUintString()
  A!: string;

  @ApiProperty({ description: 'Compressed lowest rate' })
  @IsUintString()
  B!: string;
}

export class CallerDto {
  @ApiProperty({ description: 'Address acting on the strategy' })
  @IsAddress()
  caller!: string;
}

export class CreateStrategyDto extends CallerDto {
  @ApiProperty({ description: 'Token sold by the first order' })
  @IsAddress()
  token0!: string;

  @ApiProperty({ description: 'Token sold by the second order' })
  @IsAddress()
  token1!: string;

  @ApiProperty({ type: [OrderDto] })
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @ValidateNested({ each: true })
  @Type(() => OrderDto)
  orders!: OrderDto[];
}

export class UpdateStrategyDto extends CallerDto {
  @ApiProperty({ type: [OrderDto], description: 'Orders as last read; the update fails if they changed since' })
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @ValidateNested({ each: true })
  @Type(() => OrderDto)
  currentOrders!: OrderDto[];

  @ApiProperty({ type: [OrderDto] })
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @ValidateNested({ each: true })
  @Type(() => OrderDto)
  newOrders!: OrderDto[];
}

export class PriceDto {
  @ApiProperty()
  @IsUintString()
  sourceAmount!: string;

  @ApiProperty()
  @IsUintString()
  targetAmount!: string;
}

export class GradientCurveDto {
  @ApiProperty({ enum: ['linear', 'exponential'] })
  @IsIn(['linear', 'exponential'])
  type!: 'linear' | 'exponential';

  @ApiProperty()
  @IsBoolean()
  isDutchAuction!: boolean;

  @ApiPropertyOptional({ description: 'Price step of a linear curve' })
  @IsOptional()
  @IsUintString()
  increaseAmount?: string;

  @ApiPropertyOptional({ description: 'Seconds between the steps of a linear curve' })
  @IsOptional()
  @IsInt()
  increaseInterval?: number;

  @ApiPropertyOptional({ description: 'Half-life of an exponential curve in seconds' })
  @IsOptional()
  @IsInt()
  halflife?: number;
}

export class GradientOrderDto {
  @ApiProperty({ type: PriceDto })
  @ValidateNested()
  @Type(() => PriceDto)
  initialPrice!: PriceDto;

  @ApiProperty({ type: PriceDto })
  @ValidateNested()
  @Type(() => PriceDto)
  endPrice!: PriceDto;

  @ApiProperty({ description: 'Proceeds received so far' })
  @IsUintString()
  sourceAmount!: string;

  @ApiProperty({ description: 'Inventory for sale' })
  @IsUintString()
  targetAmount!: string;

  @ApiProperty()
  @IsInt()
  tradingStartTime!: number;

  @ApiProperty()
  @IsInt()
  expiry!: number;

  @ApiProperty()
  @IsBoolean()
  tokensInverted!: boolean;

  @ApiProperty({ type: GradientCurveDto })
  @ValidateNested()
  @Type(() => GradientCurveDto)
  curve!: GradientCurveDto;
}

export class CreateGradientStrategyDto extends CallerDto {
  @ApiProperty()
  @IsAddress()
  token0!: string;

  @ApiProperty()
  @IsAddress()
  token1!: string;

  @ApiProperty({ type: [GradientOrderDto] })
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @ValidateNested({ each: true })
  @Type(() => GradientOrderDto)
  orders!: GradientOrderDto[];
}

export interface CreateStrategyResponse {
  id: string;
}

export interface DeleteStrategyResponse {
  amounts: [string, string];
}

export interface Order {
  y: string;
  z: string;
  A: string;
  B: string;
}

export interface OrderRates {
  budget: string;
  min: string;
  max: string;
  marginal: string;
}

export interface GradientOrder {
  initialPrice: { sourceAmount: string; targetAmount: string };
  endPrice: { sourceAmount: string; targetAmount: string };
  sourceAmount: string;
  targetAmount: string;
  tradingStartTime: number;
  expiry: number;
  tokensInverted: boolean;
  curve:
    | { type: 'linear'; increaseAmount: string; increaseInterval: number; isDutchAuction: boolean }
    | { type: 'exponential'; halflife: number; isDutchAuction: boolean };
}

export type Strategy =
  | {
      kind: 'standard';
      id: string;
      owner: string;
      tokens: [string, string];
      orders: [Order, Order];
      rates: [OrderRates, OrderRates];
    }
  | {
      kind: 'gradient';
      id: string;
      owner: string;
      tokens: [string, string];
      orders: [GradientOrder, GradientOrder];
    };

export interface StrategiesResponse {
  strategies: Strategy[];
  count: number;
}

export interface TradeResponse {
  sourceAmount: string;
  targetAmount: string;
  tradingFeeAmount: string;
}
