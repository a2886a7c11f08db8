import { ArrayNotEmpty, IsArray, IsOptional } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsAddress } from '../../isAddress.validator';
import { IsUintString } from '../../isUintString.validator';

export class AuctionTradeDto {
  @ApiProperty({ description: 'Buyer address' })
  @IsAddress()
  caller!: string;

  @ApiProperty({ description: 'Token to buy' })
  @IsAddress()
  token!: string;

  @ApiProperty({ description: 'Amount of the token to buy' })
  @IsUintString()
  targetAmount!: string;

  @ApiProperty({ description: 'Largest payment accepted' })
  @IsUintString()
  maxInput!: string;

  @ApiPropertyOptional({ description: 'Native token sent along when paying in the native token' })
  @IsOptional()
  @IsUintString()
  nativeValue?: string;
}

export class EnableTradingDto {
  @ApiProperty({ description: 'Token to auction' })
  @IsAddress()
  token!: string;

  @ApiProperty({ description: 'Payment leg of the initial price' })
  @IsUintString()
  sourceAmount!: string;

  @ApiProperty({ description: 'Sold leg of the initial price' })
  @IsUintString()
  targetAmount!: string;
}

export class DisableTradingDto {
  @ApiProperty({ description: 'Token to stop auctioning' })
  @IsAddress()
  token!: string;
}

export class ExecuteDto {
  @ApiProperty({ type: [String], description: 'Tokens whose auctions restart' })
  @IsArray()
  @ArrayNotEmpty()
  @IsAddress({ each: true })
  tokens!: string[];
}

export interface ExecuteResponse {
  restarted: string[];
}

export interface AuctionPriceResponse {
  token: string;
  paymentToken: string;
  sourceAmount: string;
  targetAmount: string;
  tradingStartTime: number;
  amountAvailableForTrading: string;
}

export interface AuctionTradeResponse {
  sourceAmount: string;
  targetAmount: string;
}
