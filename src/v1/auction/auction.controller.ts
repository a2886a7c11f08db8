import { Body, Controller, Get, HttpCode, Logger, Param, ParseEnumPipe, Post } from '@nestjs/common';
import { Seller } from '../../auction/auction.types';
import { DutchAuctionSeller } from '../../auction/dutch-auction-seller';
import { FeeSellerService } from '../../auction/fee-seller.service';
import { PolSellerService } from '../../auction/pol-seller.service';
import { formatEthereumAddress } from '../../isAddress.validator';
import { parseUint } from '../../isUintString.validator';
import {
  AuctionPriceResponse,
  AuctionTradeDto,
  AuctionTradeResponse,
  DisableTradingDto,
  EnableTradingDto,
  ExecuteDto,
  ExecuteResponse,
} from './auction.dto';

@Controller({ version: '1', path: 'auction' })
export class AuctionController {
  private readonly logger = new Logger(AuctionController.name);

  constructor(private polSellerService: PolSellerService, private feeSellerService: FeeSellerService) {}

  @Get(':seller/:token/price')
  getPrice(
    @Param('seller', new ParseEnumPipe(Seller)) seller: Seller,
    @Param('token') tokenParam: string,
  ): AuctionPriceResponse {
    const token = formatEthereumAddress({ value: tokenParam, key: 'token' });
    const auctionSeller = this.seller(seller);
    const price = auctionSeller.tokenPrice(token);
    return {
      token,
      paymentToken: auctionSeller.paymentToken(token),
      sourceAmount: price.sourceAmount.toString(),
      targetAmount: price.targetAmount.toString(),
      tradingStartTime: auctionSeller.auction(token)?.tradingStartTime ?? 0,
      amountAvailableForTrading: auctionSeller.amountAvailableForTrading(token).toString(),
    };
  }

  @Post(':seller/enable')
  @HttpCode(200)
  enableTrading(
    @Param('seller', new ParseEnumPipe(Seller)) seller: Seller,
    @Body() body: EnableTradingDto,
  ): AuctionPriceResponse {
    this.seller(seller).enableTrading(body.token, {
      sourceAmount: parseUint({ value: body.sourceAmount, key: 'sourceAmount' }),
      targetAmount: parseUint({ value: body.targetAmount, key: 'targetAmount' }),
    });
    return this.getPrice(seller, body.token);
  }

  @Post(':seller/disable')
  @HttpCode(204)
  disableTrading(@Param('seller', new ParseEnumPipe(Seller)) seller: Seller, @Body() body: DisableTradingDto) {
    this.seller(seller).disableTrading(body.token);
  }

  @Post('fee/execute')
  @HttpCode(200)
  execute(@Body() body: ExecuteDto): ExecuteResponse {
    return { restarted: this.feeSellerService.execute(body.tokens) };
  }

  @Post(':seller/trade')
  @HttpCode(200)
  trade(
    @Param('seller', new ParseEnumPipe(Seller)) seller: Seller,
    @Body() body: AuctionTradeDto,
  ): AuctionTradeResponse {
    try {
      const result = this.seller(seller).trade(
        body.caller,
        body.token,
        parseUint({ value: body.targetAmount, key: 'targetAmount' }),
        parseUint({ value: body.maxInput, key: 'maxInput' }),
        body.nativeValue === undefined ? 0n : parseUint({ value: body.nativeValue, key: 'nativeValue' }),
      );
      return { sourceAmount: result.sourceAmount.toString(), targetAmount: result.targetAmount.toString() };
    } catch (error) {
      this.logger.error(`Auction trade on ${seller} failed: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }

  private seller(seller: Seller): DutchAuctionSeller {
    return seller === Seller.Pol ? this.polSellerService : this.feeSellerService;
  }
}
