import { Injectable } from '@nestjs/common';
import { ExchangeErrorCode, ExchangeException } from '../errors/exchange.errors';

export const OWNERSHIP_PORT = 'OWNERSHIP_PORT';

/**
 * One ticket per strategy; whoever holds it owns the strategy.
 */
export interface OwnershipPort {
  mint(owner: string, id: bigint): void;
  burn(id: bigint): void;
  ownerOf(id: bigint): string;
}

@Injectable()
export class InMemoryTicketLedger implements OwnershipPort {
  private owners = new Map<bigint, string>();

  mint(owner: string, id: bigint) {
    if (this.owners.has(id)) {
      throw new Error(`Ticket ${id} is already minted`);
    }
    this.owners.set(id, owner);
  }

  burn(id: bigint) {
    this.ownerOf(id);
    this.owners.delete(id);
  }

  ownerOf(id: bigint): string {
    const owner = this.owners.get(id);
    if (owner === undefined) {
      throw new ExchangeException(ExchangeErrorCode.StrategyDoesNotExist);
    }
    return owner;
  }

  transfer(caller: string, to: string, id: bigint) {
    if (this.ownerOf(id).toLowerCase() !== caller.toLowerCase()) {
      throw new ExchangeException(ExchangeErrorCode.AccessDenied);
    }
    this.owners.set(id, to);
  }
}
